import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  BRIDGE_API_VERSION,
  BridgeMessageType,
  DecodeError,
  DeliveryChannel,
  Flag,
  HostCapability,
  buildFallbackUrl,
  toBridgePayload,
  type RenderMessage,
  type ResultBatch,
} from '@media-preflight/shared';
import { HostService } from '../host.service';
import type { SandboxChild, SandboxLauncher } from '../sandbox-launcher';
import { NAVIGATE_LINE_PREFIX } from '../../bridge/environments/process.environment';
import { BridgeService } from '../../bridge/bridge.service';
import { ProbeConfigService } from '../../config/probe.config';
import { ProbeService } from '../../probe/probe.service';
import { MemoryByteSource } from '../../probe/sources/byte-source';
import { ReportService } from '../../report/report.service';
import { SandboxService } from '../../sandbox/sandbox.service';
import { createMockConfigService } from '@/__mocks__/config.service';
import { movieFile } from '@/__fixtures__/iso-boxes';

vi.mock('@nestjs/common', async () => {
  const actual = await vi.importActual('@nestjs/common');
  const { MockLogger } = await import('@/__mocks__/logger');
  return {
    ...actual,
    Logger: MockLogger,
  };
});

const BASE_URL = 'http://localhost:8501/';

const batch: ResultBatch = {
  metadata: [
    {
      name: 'clip.mp4',
      byteSize: 2048,
      containerFormat: 'mp4',
      videoCodec: 'h264',
      audioCodec: 'aac',
      formatFlag: Flag.PASS,
      codecFlag: Flag.PASS,
      sizeFlag: Flag.PASS,
    },
  ],
  timeline: ['1970-01-01T00:00:00.000Z Selected 1 file(s). Starting analysis...'],
};

class FakeSandboxChild implements SandboxChild {
  readonly sent: RenderMessage[] = [];
  readonly kill = vi.fn();
  private readonly events = new EventEmitter();

  send(message: RenderMessage): void {
    this.sent.push(message);
  }

  onMessage(listener: (message: unknown) => void): void {
    this.events.on('message', listener);
  }

  onStdoutLine(listener: (line: string) => void): void {
    this.events.on('line', listener);
  }

  onExit(listener: (code: number | null) => void): void {
    this.events.on('exit', listener);
  }

  onError(listener: (error: Error) => void): void {
    this.events.on('error', listener);
  }

  emitMessage(message: unknown): void {
    this.events.emit('message', message);
  }

  emitLine(line: string): void {
    this.events.emit('line', line);
  }

  emitExit(code: number | null): void {
    this.events.emit('exit', code);
  }

  emitError(error: Error): void {
    this.events.emit('error', error);
  }
}

class FakeSandboxLauncher implements SandboxLauncher {
  readonly child = new FakeSandboxChild();
  readonly launch = vi.fn((_files: readonly string[]): SandboxChild => this.child);
}

describe('HostService', () => {
  let launcher: FakeSandboxLauncher;
  let host: HostService;

  beforeEach(() => {
    const config = new ProbeConfigService(
      createMockConfigService({
        probe: { chunkSizeBytes: 1024 },
        bridge: { handshakeGraceMs: 20 },
        host: { baseUrl: BASE_URL },
      })
    );
    launcher = new FakeSandboxLauncher();
    host = new HostService(
      launcher,
      new SandboxService(new ProbeService(config), new BridgeService(config)),
      new ReportService(config),
      config
    );
  });

  describe('runForked', () => {
    it('answers the first ready message and resolves on scoped results', async () => {
      const { child } = launcher;
      const pending = host.runForked(['/media/clip.mp4']);

      child.emitMessage({ type: BridgeMessageType.READY, apiVersion: BRIDGE_API_VERSION });
      child.emitMessage({ type: BridgeMessageType.READY, apiVersion: BRIDGE_API_VERSION });

      expect(launcher.launch).toHaveBeenCalledWith(['/media/clip.mp4']);
      expect(child.sent).toEqual([
        { type: BridgeMessageType.RENDER, sessionId: expect.any(String), args: { fileCount: 1 } },
      ]);

      const { sessionId } = child.sent[0];
      child.emitMessage({ type: BridgeMessageType.SET_FRAME_HEIGHT, sessionId, height: 3 });
      child.emitMessage({ type: BridgeMessageType.SET_VALUE, sessionId, value: toBridgePayload(batch) });

      await expect(pending).resolves.toEqual({ batch, channel: DeliveryChannel.SCOPED_MESSAGE });
      expect(child.kill).not.toHaveBeenCalled();
    });

    it('ignores results addressed to another session', async () => {
      const { child } = launcher;
      const pending = host.runForked(['/media/clip.mp4']);

      child.emitMessage({
        type: BridgeMessageType.SET_VALUE,
        sessionId: 'someone-else',
        value: toBridgePayload(batch),
      });
      child.emitExit(1);

      await expect(pending).rejects.toThrow('Sandbox exited with code 1 before delivering results');
      expect(child.kill).toHaveBeenCalledTimes(1);
    });

    it('ignores malformed messages', async () => {
      const { child } = launcher;
      const pending = host.runForked(['/media/clip.mp4']);

      child.emitMessage({ type: 'bridge:unknown' });
      child.emitMessage('ready');
      child.emitMessage({ type: BridgeMessageType.READY, apiVersion: BRIDGE_API_VERSION });
      const { sessionId } = child.sent[0];
      child.emitMessage({ type: BridgeMessageType.SET_VALUE, sessionId, value: toBridgePayload(batch) });

      await expect(pending).resolves.toMatchObject({ channel: DeliveryChannel.SCOPED_MESSAGE });
    });

    it('decodes a redirect written to stdout', async () => {
      const { child } = launcher;
      const pending = host.runForked(['/media/clip.mp4']);

      child.emitLine('[Nest] 4242  - LOG [ProbeService] Probing 1 file(s)');
      child.emitLine(`${NAVIGATE_LINE_PREFIX}${buildFallbackUrl(BASE_URL, batch)}`);
      child.emitExit(0);

      await expect(pending).resolves.toEqual({ batch, channel: DeliveryChannel.REDIRECT });
      expect(child.kill).not.toHaveBeenCalled();
    });

    it('rejects an undecodable redirect', async () => {
      const { child } = launcher;
      const pending = host.runForked(['/media/clip.mp4']);

      child.emitLine(`${NAVIGATE_LINE_PREFIX}${BASE_URL}?results=not-base64!`);

      await expect(pending).rejects.toThrow(DecodeError);
      expect(child.kill).toHaveBeenCalledTimes(1);
    });

    it('rejects when the sandbox cannot start', async () => {
      const { child } = launcher;
      const pending = host.runForked(['/media/clip.mp4']);

      child.emitError(new Error('spawn ENOENT'));

      await expect(pending).rejects.toThrow('spawn ENOENT');
    });
  });

  describe('runEmbedded', () => {
    const clip = () =>
      new MemoryByteSource('clip.mp4', movieFile({ brand: 'isom', video: 'avc1', audio: 'mp4a' }));

    it('receives the batch through the host object', async () => {
      const result = await host.runEmbedded([clip()]);

      expect(result.channel).toBe(DeliveryChannel.DIRECT_CALL);
      expect(result.batch.metadata.map((record) => record.name)).toEqual(['clip.mp4']);
      expect(result.batch.metadata[0].videoCodec).toBe('h264');
    });

    it('receives the batch by message when no host object is offered', async () => {
      const result = await host.runEmbedded([clip()], HostCapability.MESSAGE_ONLY);

      expect(result.channel).toBe(DeliveryChannel.SCOPED_MESSAGE);
      expect(
        result.batch.timeline.some((entry) => /Connected to host \(session id: .+\)\.$/.test(entry))
      ).toBe(true);
    });
  });

  describe('decode', () => {
    it('decodes a fallback URL', () => {
      expect(host.decode(buildFallbackUrl(BASE_URL, batch))).toEqual(batch);
    });

    it('returns undefined for an empty value', () => {
      expect(host.decode('   ')).toBeUndefined();
    });

    it('throws on a malformed value', () => {
      expect(() => host.decode('%%%')).toThrow(DecodeError);
    });
  });

  describe('writeReport', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'host-service-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('writes the batch records as a workbook', async () => {
      const filePath = await host.writeReport(batch, dir, new Date('2024-05-01T10:20:30Z'));

      expect(filePath).toBe(path.join(dir, 'video_metadata_2024-05-01T10-20-30.xlsx'));
      await expect(fs.stat(filePath)).resolves.toBeDefined();
    });
  });
});
