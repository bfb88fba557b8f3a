import { ChannelError, type OutboundMessage } from '@media-preflight/shared';
import type { HostEnvironment, HostObject, InboundListener } from '../types';

export interface EmbeddedHostHandlers {
  /** Offered to the sandbox as a directly callable host object */
  hostObject?: HostObject;
  /** Receives sandbox messages; without it posting fails */
  onMessage?: (message: OutboundMessage) => void;
  /** Receives redirect URLs; without it navigation fails */
  onNavigate?: (url: string) => void;
}

/**
 * Sandbox and host in the same process. Which channels exist depends on
 * the handlers the host passes in.
 */
export class EmbeddedHostEnvironment implements HostEnvironment {
  private readonly listeners = new Set<InboundListener>();

  constructor(
    readonly hostBaseUrl: string,
    private readonly handlers: EmbeddedHostHandlers = {}
  ) {}

  locateHostObject(): HostObject | undefined {
    return this.handlers.hostObject;
  }

  postToHost(message: OutboundMessage): void {
    if (!this.handlers.onMessage) {
      throw new ChannelError('host does not accept messages');
    }
    this.handlers.onMessage(message);
  }

  subscribe(listener: InboundListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  navigateHost(url: string): void {
    if (!this.handlers.onNavigate) {
      throw new ChannelError('host cannot be navigated');
    }
    this.handlers.onNavigate(url);
  }

  /**
   * Host side: deliver a message to the sandbox
   */
  sendToSandbox(message: unknown): void {
    for (const listener of [...this.listeners]) {
      listener(message);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
