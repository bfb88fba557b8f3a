import { Inject, Injectable } from '@nestjs/common';
import type { ProbeTimeline } from '@media-preflight/shared';
import { ProbeConfigService } from '../config/probe.config';
import { BridgeProtocol } from './bridge-protocol';
import { BridgeSession } from './bridge-session';
import type { BridgeTimings, HostEnvironment } from './types';

@Injectable()
export class BridgeService {
  constructor(@Inject(ProbeConfigService) private readonly config: ProbeConfigService) {}

  get timings(): BridgeTimings {
    return this.config.bridgeTimings;
  }

  /**
   * Protocol for one sandbox run, using the configured timings
   */
  createProtocol(
    env: HostEnvironment,
    timeline: ProbeTimeline,
    session: BridgeSession = new BridgeSession()
  ): BridgeProtocol {
    return new BridgeProtocol(session, env, timeline, this.timings);
  }
}
