import { Injectable, Logger } from '@nestjs/common';
import { fork, type ChildProcess } from 'child_process';
import * as path from 'path';
import { createInterface } from 'readline';
import type { RenderMessage } from '@media-preflight/shared';

/**
 * Host-side handle on a running sandbox process
 */
export interface SandboxChild {
  send(message: RenderMessage): void;
  onMessage(listener: (message: unknown) => void): void;
  /** Every line the sandbox writes to stdout */
  onStdoutLine(listener: (line: string) => void): void;
  /** After the process ended and its output was drained */
  onExit(listener: (code: number | null) => void): void;
  onError(listener: (error: Error) => void): void;
  kill(): void;
}

/**
 * Starts sandbox processes. Also the injection token; tests provide their
 * own implementation.
 */
export abstract class SandboxLauncher {
  abstract launch(files: readonly string[]): SandboxChild;
}

// main.ts next to this directory, with whatever extension this build runs from
const SANDBOX_ENTRY = path.resolve(__dirname, '..', `main${path.extname(__filename)}`);

class ForkedSandboxChild implements SandboxChild {
  constructor(private readonly child: ChildProcess) {}

  send(message: RenderMessage): void {
    this.child.send(message);
  }

  onMessage(listener: (message: unknown) => void): void {
    this.child.on('message', (message) => listener(message));
  }

  onStdoutLine(listener: (line: string) => void): void {
    if (!this.child.stdout) {
      return;
    }
    createInterface({ input: this.child.stdout, crlfDelay: Infinity }).on('line', listener);
  }

  onExit(listener: (code: number | null) => void): void {
    this.child.on('close', (code) => listener(code));
  }

  onError(listener: (error: Error) => void): void {
    this.child.on('error', listener);
  }

  kill(): void {
    this.child.kill();
  }
}

/**
 * Runs the sandbox command of this CLI as a forked child with an IPC channel.
 * The child inherits the loader flags of the parent, so it also starts from
 * TypeScript sources under tsx.
 */
@Injectable()
export class ForkedSandboxLauncher extends SandboxLauncher {
  private readonly logger = new Logger(ForkedSandboxLauncher.name);

  launch(files: readonly string[]): SandboxChild {
    this.logger.debug(`Forking ${SANDBOX_ENTRY} for ${files.length} file(s)`);
    const child = fork(SANDBOX_ENTRY, ['sandbox', ...files], {
      stdio: ['ignore', 'pipe', 'inherit', 'ipc'],
    });
    return new ForkedSandboxChild(child);
  }
}
