import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ChannelError,
  ProbeTimeline,
  type DeliveryChannel,
  type ResultBatch,
  type ValidationPolicy,
} from '@media-preflight/shared';
import { BridgeService } from '../bridge/bridge.service';
import { BridgeSession, type BridgeSessionSnapshot } from '../bridge/bridge-session';
import type { HostEnvironment } from '../bridge/types';
import { ProbeService, type ProbeInput } from '../probe/probe.service';

export interface SandboxRunOptions {
  /** Defaults to a fresh timeline */
  timeline?: ProbeTimeline;
  policy?: ValidationPolicy;
}

export interface SandboxRunResult {
  batch: ResultBatch;
  /** Channel the batch went out on; undefined when every channel failed */
  channel: DeliveryChannel | undefined;
  session: BridgeSessionSnapshot;
}

/**
 * Sandbox entry point: one bridge session and one timeline per run.
 *
 * The handshake runs while files are probed. Before delivering, a host that
 * has not answered yet gets the configured grace period.
 */
@Injectable()
export class SandboxService {
  private readonly logger = new Logger(SandboxService.name);

  constructor(
    @Inject(ProbeService) private readonly probeService: ProbeService,
    @Inject(BridgeService) private readonly bridgeService: BridgeService
  ) {}

  async run(
    inputs: readonly ProbeInput[],
    env: HostEnvironment,
    options: SandboxRunOptions = {}
  ): Promise<SandboxRunResult> {
    const timeline = options.timeline ?? new ProbeTimeline();
    const session = new BridgeSession();
    const protocol = this.bridgeService.createProtocol(env, timeline, session);

    try {
      protocol.start();

      const metadata = await this.probeService.runBatch(inputs, {
        timeline,
        policy: options.policy,
      });

      const state = await protocol.whenSettled();
      this.logger.debug(`Bridge state before delivery: ${state}`);

      const batch: ResultBatch = { metadata, timeline: [...timeline.entries] };
      let channel: DeliveryChannel | undefined;
      try {
        channel = protocol.deliver(batch);
      } catch (error) {
        if (!(error instanceof ChannelError)) {
          throw error;
        }
        this.logger.error(`Results for ${metadata.length} file(s) were not delivered`);
      }

      return { batch, channel, session: session.snapshot() };
    } finally {
      protocol.dispose();
    }
  }
}
