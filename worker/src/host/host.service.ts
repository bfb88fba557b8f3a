import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  BridgeMessageType,
  ChannelError,
  DeliveryChannel,
  HostCapability,
  OutboundMessageSchema,
  decodeResults,
  type BridgePayload,
  type OutboundMessage,
  type ResultBatch,
} from '@media-preflight/shared';
import { ProbeConfigService } from '../config/probe.config';
import { EmbeddedHostEnvironment } from '../bridge/environments/embedded.environment';
import { NAVIGATE_LINE_PREFIX } from '../bridge/environments/process.environment';
import type { HostObject } from '../bridge/types';
import type { ProbeInput } from '../probe/probe.service';
import { ReportService } from '../report/report.service';
import { SandboxService } from '../sandbox/sandbox.service';
import { SandboxLauncher, type SandboxChild } from './sandbox-launcher';

export interface HostRunResult {
  batch: ResultBatch;
  /** How the batch reached the host */
  channel: DeliveryChannel;
}

function batchOf(payload: BridgePayload): ResultBatch {
  return { metadata: payload.metadata, timeline: payload.timeline };
}

/**
 * Orchestrating side of the bridge: starts a sandbox, answers its
 * handshake and collects the batch it delivers.
 */
@Injectable()
export class HostService {
  private readonly logger = new Logger(HostService.name);

  constructor(
    @Inject(SandboxLauncher) private readonly launcher: SandboxLauncher,
    @Inject(SandboxService) private readonly sandboxService: SandboxService,
    @Inject(ReportService) private readonly reportService: ReportService,
    @Inject(ProbeConfigService) private readonly config: ProbeConfigService
  ) {}

  /**
   * Probe `files` in a child process and wait for its results.
   *
   * Rejects when the child fails to start, sends an undecodable redirect,
   * or exits without delivering.
   */
  runForked(files: readonly string[]): Promise<HostRunResult> {
    const sessionId = randomUUID();

    return new Promise<HostRunResult>((resolve, reject) => {
      let settled = false;
      let handshakeSent = false;

      const child = this.launcher.launch(files);

      const succeed = (batch: ResultBatch, channel: DeliveryChannel) => {
        if (settled) {
          return;
        }
        settled = true;
        this.logger.log(`Received ${batch.metadata.length} result(s) via ${channel}`);
        resolve({ batch, channel });
      };
      const fail = (error: Error) => {
        if (settled) {
          return;
        }
        settled = true;
        child.kill();
        reject(error);
      };

      child.onMessage((raw) => {
        const parsed = OutboundMessageSchema.safeParse(raw);
        if (!parsed.success) {
          this.logger.warn('Ignoring malformed message from sandbox');
          return;
        }
        const message = parsed.data;

        if (message.type === BridgeMessageType.READY) {
          if (!handshakeSent) {
            handshakeSent = true;
            this.handshake(child, sessionId, files.length);
          }
          return;
        }
        if (message.type === BridgeMessageType.SET_VALUE) {
          if (message.sessionId !== sessionId) {
            this.logger.warn(`Ignoring results for unknown session ${message.sessionId}`);
            return;
          }
          succeed(batchOf(message.value), DeliveryChannel.SCOPED_MESSAGE);
          return;
        }
        this.logSideMessage(message);
      });

      child.onStdoutLine((line) => {
        if (!line.startsWith(NAVIGATE_LINE_PREFIX)) {
          this.logger.debug(`[sandbox] ${line}`);
          return;
        }
        try {
          const batch = decodeResults(line.slice(NAVIGATE_LINE_PREFIX.length));
          if (!batch) {
            this.logger.warn('Sandbox redirect carried no results');
            return;
          }
          succeed(batch, DeliveryChannel.REDIRECT);
        } catch (error) {
          fail(error instanceof Error ? error : new Error(String(error)));
        }
      });

      child.onError((error) => fail(error));
      child.onExit((code) =>
        fail(new ChannelError(`Sandbox exited with code ${code ?? 'null'} before delivering results`))
      );
    });
  }

  /**
   * Probe in this process, with the sandbox reaching the host through the
   * given capability. The redirect channel is always available.
   */
  async runEmbedded(
    inputs: readonly ProbeInput[],
    capability: HostCapability = HostCapability.DIRECT_OBJECT
  ): Promise<HostRunResult> {
    const sessionId = randomUUID();
    // Written by the host callbacks below
    const delivery: { result?: HostRunResult } = {};

    const hostObject: HostObject = {
      setComponentValue: (payload) => {
        delivery.result = { batch: batchOf(payload), channel: DeliveryChannel.DIRECT_CALL };
      },
      setFrameHeight: (height) => this.logger.verbose(`Sandbox height: ${height}`),
    };

    const env: EmbeddedHostEnvironment = new EmbeddedHostEnvironment(this.config.hostBaseUrl, {
      hostObject: capability === HostCapability.DIRECT_OBJECT ? hostObject : undefined,
      onMessage: (message) => {
        if (message.type === BridgeMessageType.READY) {
          env.sendToSandbox({ type: BridgeMessageType.RENDER, sessionId });
        } else if (
          message.type === BridgeMessageType.SET_VALUE &&
          message.sessionId === sessionId
        ) {
          delivery.result = {
            batch: batchOf(message.value),
            channel: DeliveryChannel.SCOPED_MESSAGE,
          };
        } else {
          this.logSideMessage(message);
        }
      },
      onNavigate: (url) => {
        const batch = decodeResults(url);
        if (batch) {
          delivery.result = { batch, channel: DeliveryChannel.REDIRECT };
        }
      },
    });

    await this.sandboxService.run(inputs, env);

    const { result } = delivery;
    if (!result) {
      throw new ChannelError('Sandbox did not deliver results');
    }
    this.logger.log(`Received ${result.batch.metadata.length} result(s) via ${result.channel}`);
    return result;
  }

  /**
   * Decode an inbound fallback value (full URL, query string or bare value)
   *
   * @throws DecodeError
   */
  decode(input: string): ResultBatch | undefined {
    const batch = decodeResults(input);
    if (!batch) {
      this.logger.warn('No results found in the given value');
    }
    return batch;
  }

  writeReport(batch: ResultBatch, outputDir?: string, generatedAt?: Date): Promise<string> {
    return this.reportService.writeReport(batch.metadata, { outputDir, generatedAt });
  }

  private handshake(child: SandboxChild, sessionId: string, fileCount: number): void {
    this.logger.debug(`Sandbox is ready; starting session ${sessionId}`);
    child.send({ type: BridgeMessageType.RENDER, sessionId, args: { fileCount } });
  }

  private logSideMessage(message: OutboundMessage): void {
    switch (message.type) {
      case BridgeMessageType.SET_READY:
        this.logger.debug(`Sandbox signalled ready for session ${message.sessionId}`);
        break;
      case BridgeMessageType.SET_FRAME_HEIGHT:
        this.logger.verbose(`Sandbox height: ${message.height}`);
        break;
      default:
        break;
    }
  }
}
