import type { BridgePayload, OutboundMessage } from '@media-preflight/shared';

/**
 * Host object reachable through the embedding relationship. Only
 * setComponentValue is required; the other calls are used when present.
 */
export interface HostObject {
  setComponentValue(payload: BridgePayload): void;
  setComponentReady?(): void;
  setFrameHeight?(height: number): void;
}

export type InboundListener = (message: unknown) => void;

/**
 * What the sandbox can do towards its host. Every call may throw; the
 * protocol treats a throw as a failed attempt on that channel.
 */
export interface HostEnvironment {
  /** Base URL the redirect channel appends the encoded batch to */
  readonly hostBaseUrl: string;
  /** The host object when it is directly callable right now */
  locateHostObject(): HostObject | undefined;
  /** Send a message; without a sessionId it is a broadcast to whoever listens */
  postToHost(message: OutboundMessage): void;
  /** Returns the unsubscribe function */
  subscribe(listener: InboundListener): () => void;
  /** Navigate the host to `url` */
  navigateHost(url: string): void;
}

export interface BridgeTimings {
  announceIntervalMs: number;
  announceMaxAttempts: number;
  pollIntervalMs: number;
  pollMaxAttempts: number;
  handshakeGraceMs: number;
}

export const DEFAULT_BRIDGE_TIMINGS: Readonly<BridgeTimings> = Object.freeze({
  announceIntervalMs: 1500,
  announceMaxAttempts: 10,
  pollIntervalMs: 250,
  pollMaxAttempts: 40,
  handshakeGraceMs: 2000,
});
