import { Logger } from '@nestjs/common';
import {
  BRIDGE_API_VERSION,
  BridgeMessageType,
  BridgeState,
  ChannelError,
  ChannelKind,
  DeliveryChannel,
  HostCapability,
  RenderMessageSchema,
  buildFallbackUrl,
  errorMessage,
  toBridgePayload,
  type BridgePayload,
  type ProbeTimeline,
  type ResultBatch,
} from '@media-preflight/shared';
import type { BridgeSession } from './bridge-session';
import {
  DEFAULT_BRIDGE_TIMINGS,
  type BridgeTimings,
  type HostEnvironment,
  type HostObject,
} from './types';

type LogLevel = 'log' | 'warn' | 'error' | 'debug';

/**
 * Handshake and delivery state machine between a sandbox run and its host.
 *
 * unconnected -> announcing -> (connected | degraded-polling) -> delivering -> done
 *
 * While announcing, a ready message is broadcast every announceIntervalMs
 * and the environment is polled for a host object every pollIntervalMs. The
 * first of an inbound handshake or a located host object connects the
 * session and cancels both timers. State is re-checked after every call
 * into the environment, since a handshake can arrive synchronously from
 * inside a timer tick.
 *
 * Every timeline entry also asks the host to resize the sandbox to the
 * timeline height. Only the first resize failure is logged.
 */
export class BridgeProtocol {
  private readonly logger = new Logger(BridgeProtocol.name);
  private readonly timings: BridgeTimings;

  private announceTimer: NodeJS.Timeout | null = null;
  private pollTimer: NodeJS.Timeout | null = null;
  private unsubscribeInbound: (() => void) | null = null;
  private unsubscribeTimeline: (() => void) | null = null;
  private settledWaiters: Array<() => void> = [];

  private announceErrorLogged = false;
  private resizeErrorLogged = false;

  constructor(
    private readonly session: BridgeSession,
    private readonly env: HostEnvironment,
    private readonly timeline: ProbeTimeline,
    timings: Partial<BridgeTimings> = {}
  ) {
    this.timings = { ...DEFAULT_BRIDGE_TIMINGS, ...timings };
  }

  get state(): BridgeState {
    return this.session.state;
  }

  start(): void {
    if (this.session.state !== BridgeState.UNCONNECTED) {
      throw new Error(`Bridge already started (state: ${this.session.state})`);
    }

    this.session.state = BridgeState.ANNOUNCING;
    this.unsubscribeInbound = this.env.subscribe((message) => this.handleInbound(message));
    this.unsubscribeTimeline = this.timeline.subscribe(() => this.requestResize());
    this.log('Sandbox loaded. Waiting for host handshake...');

    // First lookup and first announcement happen right away
    this.pollForHostObject();
    if (!this.isWaiting()) {
      return;
    }
    this.announce(true);
    if (!this.isWaiting()) {
      return;
    }

    if (this.session.state === BridgeState.ANNOUNCING) {
      this.pollTimer = setInterval(() => this.onPollTick(), this.timings.pollIntervalMs);
    }
    if (this.session.attemptCount < this.timings.announceMaxAttempts) {
      this.announceTimer = setInterval(
        () => this.onAnnounceTick(),
        this.timings.announceIntervalMs
      );
    }
  }

  /**
   * Resolves with the current state once the protocol is no longer
   * announcing, or after `graceMs`, whichever comes first
   */
  whenSettled(graceMs: number = this.timings.handshakeGraceMs): Promise<BridgeState> {
    if (this.session.state !== BridgeState.ANNOUNCING) {
      return Promise.resolve(this.session.state);
    }

    return new Promise<BridgeState>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.settledWaiters = this.settledWaiters.filter((waiter) => waiter !== done);
        resolve(this.session.state);
      };
      const timer = setTimeout(done, graceMs);
      this.settledWaiters.push(done);
    });
  }

  /**
   * Hand a completed batch to the host over the first channel that works:
   * direct call, session-scoped message, then redirect.
   *
   * @throws ChannelError when every channel failed
   */
  deliver(batch: ResultBatch): DeliveryChannel {
    if (this.session.state === BridgeState.UNCONNECTED) {
      throw new Error('Bridge has not been started');
    }
    if (this.session.state === BridgeState.DELIVERING || this.session.isTerminal) {
      throw new Error(`Bridge cannot deliver in state ${this.session.state}`);
    }

    this.clearTimers();
    this.session.state = BridgeState.DELIVERING;
    this.notifySettled();

    const payload = toBridgePayload(batch);
    this.log(
      `Delivering ${payload.metadata.length} result(s), encoded payload size ${payload.payloadSizeHint} characters.`
    );

    const attempts: Array<[DeliveryChannel, () => boolean]> = [
      [DeliveryChannel.DIRECT_CALL, () => this.deliverDirect(payload)],
      [DeliveryChannel.SCOPED_MESSAGE, () => this.deliverByMessage(payload)],
      [DeliveryChannel.REDIRECT, () => this.deliverByRedirect(batch)],
    ];

    for (const [channel, attempt] of attempts) {
      try {
        if (!attempt()) {
          continue;
        }
      } catch (error) {
        this.log(`Delivery via ${channel} failed: ${errorMessage(error)}`, 'warn');
        continue;
      }

      if (channel === DeliveryChannel.REDIRECT) {
        this.session.channelKind = ChannelKind.FALLBACK_REDIRECT;
      }
      this.log(`Delivered results via ${channel}.`, 'log');
      this.dispose();
      return channel;
    }

    this.log('All delivery channels failed. Results remain available locally.', 'error');
    this.dispose();
    throw new ChannelError('All delivery channels failed');
  }

  /**
   * Release timers and subscriptions. Safe to call more than once.
   */
  dispose(): void {
    this.clearTimers();
    this.unsubscribeInbound?.();
    this.unsubscribeInbound = null;
    this.unsubscribeTimeline?.();
    this.unsubscribeTimeline = null;
    this.session.state = BridgeState.DONE;
    this.notifySettled();
  }

  private handleInbound(message: unknown): void {
    const parsed = RenderMessageSchema.safeParse(message);
    if (!parsed.success) {
      return;
    }

    const { sessionId, args } = parsed.data;
    if (!this.isWaiting()) {
      this.logger.debug(`Ignoring handshake for session ${sessionId} in state ${this.session.state}`);
      return;
    }

    this.session.hostId = sessionId;
    this.connect(HostCapability.MESSAGE_ONLY, `Connected to host (session id: ${sessionId}).`);

    if (args && Object.keys(args).length > 0) {
      this.log(`Received args: ${JSON.stringify(args)}`);
    }
  }

  private onPollTick(): void {
    if (this.session.state !== BridgeState.ANNOUNCING) {
      this.stopPolling();
      return;
    }
    this.pollForHostObject();
  }

  private pollForHostObject(): void {
    this.session.pollAttempts += 1;

    let host: HostObject | undefined;
    try {
      host = this.env.locateHostObject();
    } catch (error) {
      this.log(`Accessing the host object threw: ${errorMessage(error)}`, 'warn');
    }
    if (this.session.state !== BridgeState.ANNOUNCING) {
      return;
    }

    if (host) {
      this.session.hostObject = host;
      this.connect(HostCapability.DIRECT_OBJECT, 'Detected a directly callable host object.');
      return;
    }

    if (this.session.pollAttempts >= this.timings.pollMaxAttempts) {
      this.stopPolling();
      this.session.state = BridgeState.DEGRADED_POLLING;
      this.notifySettled();
      this.log('Host object not detected after polling. Using broadcast messages only.', 'warn');
    }
  }

  private onAnnounceTick(): void {
    if (!this.isWaiting()) {
      this.stopAnnouncing();
      return;
    }

    this.announce(false);
    if (!this.isWaiting()) {
      return;
    }

    if (this.session.attemptCount >= this.timings.announceMaxAttempts) {
      this.stopAnnouncing();
      this.log('No host response after announcing readiness multiple times.', 'warn');
    }
  }

  private announce(withLog: boolean): void {
    this.session.attemptCount += 1;
    try {
      this.env.postToHost({ type: BridgeMessageType.READY, apiVersion: BRIDGE_API_VERSION });
      if (withLog) {
        this.log('Announced readiness to host.');
      }
    } catch (error) {
      if (!this.announceErrorLogged) {
        this.announceErrorLogged = true;
        this.log(`Failed to announce readiness: ${errorMessage(error)}`, 'warn');
      }
    }
  }

  private connect(capability: HostCapability, message: string): void {
    // Timers go first so no tick can run after this point
    this.clearTimers();
    this.session.state = BridgeState.CONNECTED;
    this.session.channelKind = ChannelKind.DIRECT;
    this.session.capability = capability;
    this.notifySettled();

    this.log(message, 'log');
    this.signalReady();
  }

  private signalReady(): void {
    const host = this.session.hostObject;
    try {
      if (host) {
        host.setComponentReady?.();
      } else if (this.session.hostId !== undefined) {
        this.env.postToHost({
          type: BridgeMessageType.SET_READY,
          sessionId: this.session.hostId,
        });
      }
    } catch (error) {
      this.log(`Failed to signal readiness: ${errorMessage(error)}`, 'warn');
    }
  }

  private requestResize(): void {
    if (this.session.state === BridgeState.UNCONNECTED || this.session.isTerminal) {
      return;
    }

    const height = this.timeline.size;
    try {
      const host = this.session.hostObject;
      if (host?.setFrameHeight) {
        host.setFrameHeight(height);
        return;
      }
      this.env.postToHost({
        type: BridgeMessageType.SET_FRAME_HEIGHT,
        sessionId: this.session.hostId,
        height,
      });
    } catch (error) {
      if (this.resizeErrorLogged) {
        return;
      }
      // Set before logging: the log line itself triggers another resize
      this.resizeErrorLogged = true;
      this.log(`Unable to request frame resize: ${errorMessage(error)}`, 'warn');
    }
  }

  private deliverDirect(payload: BridgePayload): boolean {
    const host = this.session.hostObject;
    if (!host) {
      this.log('Cannot send results by direct call (no host object).');
      return false;
    }
    host.setComponentValue(payload);
    return true;
  }

  private deliverByMessage(payload: BridgePayload): boolean {
    if (this.session.hostId === undefined) {
      this.log('Cannot send results by message (no session id).');
      return false;
    }
    this.env.postToHost({
      type: BridgeMessageType.SET_VALUE,
      sessionId: this.session.hostId,
      value: payload,
    });
    return true;
  }

  private deliverByRedirect(batch: ResultBatch): boolean {
    this.env.navigateHost(buildFallbackUrl(this.env.hostBaseUrl, batch));
    return true;
  }

  private isWaiting(): boolean {
    return (
      this.session.state === BridgeState.ANNOUNCING ||
      this.session.state === BridgeState.DEGRADED_POLLING
    );
  }

  private notifySettled(): void {
    const waiters = this.settledWaiters;
    this.settledWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  private stopPolling(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  private stopAnnouncing(): void {
    if (this.announceTimer) {
      clearInterval(this.announceTimer);
      this.announceTimer = null;
    }
  }

  private clearTimers(): void {
    this.stopPolling();
    this.stopAnnouncing();
  }

  private log(message: string, level: LogLevel = 'debug'): void {
    this.logger[level](message);
    this.timeline.append(message);
  }
}
