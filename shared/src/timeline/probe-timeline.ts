export type TimelineListener = (entry: string) => void;

export interface ProbeTimelineOptions {
  /** Clock used for entry timestamps (defaults to Date.now) */
  now?: () => number;
}

/**
 * Append-only diagnostic log of one probe run.
 *
 * Entries are `<ISO timestamp> <message>` strings. Nothing removes or
 * rewrites an entry once appended, so readers may hold on to `entries`.
 */
export class ProbeTimeline {
  private readonly items: string[] = [];
  private readonly listeners = new Set<TimelineListener>();
  private readonly now: () => number;

  constructor(options: ProbeTimelineOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Snapshot of the entries appended so far
   */
  get entries(): readonly string[] {
    return this.items.slice();
  }

  append(message: string): string {
    const entry = `${new Date(this.now()).toISOString()} ${message}`;
    this.items.push(entry);
    for (const listener of [...this.listeners]) {
      listener(entry);
    }
    return entry;
  }

  /**
   * Call `listener` after every append. Returns the unsubscribe function.
   */
  subscribe(listener: TimelineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
