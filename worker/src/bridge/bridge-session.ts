import {
  BridgeState,
  ChannelKind,
  type HostCapability,
} from '@media-preflight/shared';
import type { HostObject } from './types';

export interface BridgeSessionSnapshot {
  state: BridgeState;
  hostId: string | undefined;
  channelKind: ChannelKind;
  capability: HostCapability | undefined;
  attemptCount: number;
  pollAttempts: number;
}

/**
 * State of the one bridge between a sandbox run and its host.
 *
 * Owned by the sandbox entry point and handed to the protocol, which is
 * the only writer.
 */
export class BridgeSession {
  state: BridgeState = BridgeState.UNCONNECTED;
  /** Session id from the host handshake; absent until then */
  hostId: string | undefined;
  channelKind: ChannelKind = ChannelKind.UNDISCOVERED;
  capability: HostCapability | undefined;
  /** Ready announcements broadcast so far */
  attemptCount = 0;
  /** Host object lookups so far */
  pollAttempts = 0;
  hostObject: HostObject | undefined;

  get isTerminal(): boolean {
    return this.state === BridgeState.DONE;
  }

  snapshot(): BridgeSessionSnapshot {
    return {
      state: this.state,
      hostId: this.hostId,
      channelKind: this.channelKind,
      capability: this.capability,
      attemptCount: this.attemptCount,
      pollAttempts: this.pollAttempts,
    };
  }
}
