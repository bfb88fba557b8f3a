/**
 * Random-access view of a file's bytes. The scheduler only ever asks for
 * ascending windows, one at a time.
 */
export interface ByteSource {
  readonly name: string;
  readonly size: number;
  /**
   * Read up to `length` bytes starting at `offset`. A short read is only
   * allowed at the end of the source.
   */
  read(offset: number, length: number, signal?: AbortSignal): Promise<Uint8Array>;
  close?(): Promise<void>;
}

/**
 * ByteSource over an in-memory buffer
 */
export class MemoryByteSource implements ByteSource {
  readonly size: number;

  constructor(
    readonly name: string,
    private readonly bytes: Uint8Array
  ) {
    this.size = bytes.length;
  }

  async read(offset: number, length: number, signal?: AbortSignal): Promise<Uint8Array> {
    signal?.throwIfAborted();
    return this.bytes.subarray(offset, Math.min(offset + length, this.size));
  }
}
