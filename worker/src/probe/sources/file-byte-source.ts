import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ReadError, errorMessage } from '@media-preflight/shared';
import type { ByteSource } from './byte-source';

/**
 * ByteSource backed by a file on disk. The handle is opened on the first
 * read and released by close(); a closed source does not reopen.
 */
export class FileByteSource implements ByteSource {
  private opening: Promise<fs.FileHandle> | null = null;
  private closed = false;

  private constructor(
    readonly name: string,
    readonly size: number,
    private readonly filePath: string
  ) {}

  static async open(filePath: string): Promise<FileByteSource> {
    let stat: Stats;
    try {
      stat = await fs.stat(filePath);
    } catch (error) {
      throw new ReadError(errorMessage(error), { cause: error });
    }
    if (!stat.isFile()) {
      throw new ReadError(`${filePath} is not a regular file`);
    }
    return new FileByteSource(path.basename(filePath), stat.size, filePath);
  }

  async read(offset: number, length: number, signal?: AbortSignal): Promise<Uint8Array> {
    signal?.throwIfAborted();
    const handle = await this.handle();
    signal?.throwIfAborted();

    const buffer = new Uint8Array(Math.max(0, Math.min(length, this.size - offset)));
    let filled = 0;
    while (filled < buffer.length) {
      const { bytesRead } = await handle.read(
        buffer,
        filled,
        buffer.length - filled,
        offset + filled
      );
      signal?.throwIfAborted();
      if (bytesRead === 0) {
        break;
      }
      filled += bytesRead;
    }

    return filled === buffer.length ? buffer : buffer.subarray(0, filled);
  }

  /**
   * Release the handle, waiting for an open still in flight
   */
  async close(): Promise<void> {
    this.closed = true;
    const opening = this.opening;
    this.opening = null;
    if (!opening) {
      return;
    }

    let handle: fs.FileHandle;
    try {
      handle = await opening;
    } catch {
      // The failed open is reported to the read that started it
      return;
    }
    await handle.close();
  }

  private handle(): Promise<fs.FileHandle> {
    if (this.closed) {
      return Promise.reject(new ReadError(`${this.name} is closed`));
    }
    if (!this.opening) {
      this.opening = fs.open(this.filePath, 'r');
    }
    return this.opening;
  }
}
