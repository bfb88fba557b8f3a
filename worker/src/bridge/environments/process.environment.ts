import { ChannelError, type OutboundMessage } from '@media-preflight/shared';
import type { HostEnvironment, HostObject, InboundListener } from '../types';

/** Prefix of the stdout line that carries a redirect URL to the host process */
export const NAVIGATE_LINE_PREFIX = 'bridge:navigate ';

/**
 * The parts of a child process's `process` object the bridge uses
 */
export interface IpcEndpoint {
  send?(message: unknown): boolean;
  readonly connected?: boolean;
  on(event: 'message', listener: (message: unknown) => void): unknown;
  off(event: 'message', listener: (message: unknown) => void): unknown;
}

export interface LineWriter {
  write(chunk: string): unknown;
}

/**
 * Sandbox running as a child process of the host. Messages go over the
 * IPC channel; there is never a directly callable host object. The
 * redirect channel writes the URL as a line on stdout, which works even
 * when the child was started without IPC.
 */
export class ProcessHostEnvironment implements HostEnvironment {
  constructor(
    readonly hostBaseUrl: string,
    private readonly endpoint: IpcEndpoint = process,
    private readonly output: LineWriter = process.stdout
  ) {}

  locateHostObject(): HostObject | undefined {
    return undefined;
  }

  postToHost(message: OutboundMessage): void {
    if (!this.endpoint.send || this.endpoint.connected === false) {
      throw new ChannelError('no IPC channel to the host process');
    }
    this.endpoint.send(message);
  }

  subscribe(listener: InboundListener): () => void {
    this.endpoint.on('message', listener);
    return () => {
      this.endpoint.off('message', listener);
    };
  }

  navigateHost(url: string): void {
    this.output.write(`${NAVIGATE_LINE_PREFIX}${url}\n`);
  }
}
