import { Logger } from '@nestjs/common';
import {
  ParseError,
  ParseStatus,
  ProbeError,
  ReadError,
  TimeoutError,
  errorMessage,
  formatMiB,
  type ProbeTimeline,
} from '@media-preflight/shared';
import {
  IncrementalContainerParser,
  type ContainerInfo,
  type ParseProgress,
} from './parser/container-parser';
import type { ByteSource } from './sources/byte-source';

export const DEFAULT_CHUNK_SIZE = 4 * 1024 * 1024;
export const DEFAULT_FILE_TIMEOUT_MS = 45_000;

// Progress goes to the timeline for the first chunk, every Nth chunk and the last one
const PROGRESS_EVERY = 5;

export interface ChunkSchedulerOptions {
  chunkSize?: number;
  timeoutMs?: number;
  maxMetadataBoxBytes?: number;
  timeline?: ProbeTimeline;
}

export interface ParseState {
  offset: number;
  bytesRead: number;
  status: ParseStatus;
}

/**
 * Feeds one file to the container parser in bounded windows.
 *
 * One read is in flight at a time and windows are appended in ascending
 * order. A single timer wraps the whole file; when it fires, outstanding
 * reads are aborted and run() rejects with TimeoutError. Read failures
 * reject with ReadError, parser failures with ParseError. Nothing is retried.
 */
export class ChunkScheduler {
  private readonly logger = new Logger(ChunkScheduler.name);
  private readonly chunkSize: number;
  private readonly timeoutMs: number;
  private readonly parser: IncrementalContainerParser;
  private readonly controller = new AbortController();
  private readonly state: ParseState = {
    offset: 0,
    bytesRead: 0,
    status: ParseStatus.READING,
  };
  private started = false;

  constructor(
    private readonly source: ByteSource,
    private readonly options: ChunkSchedulerOptions = {}
  ) {
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FILE_TIMEOUT_MS;
    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${this.chunkSize}`);
    }
    this.parser = new IncrementalContainerParser({
      maxMetadataBoxBytes: options.maxMetadataBoxBytes,
    });
  }

  get parseState(): Readonly<ParseState> {
    return { ...this.state };
  }

  /**
   * Probe the source until the parser reaches a terminal outcome
   */
  run(): Promise<ContainerInfo> {
    if (this.started) {
      return Promise.reject(new Error('ChunkScheduler.run() can only be called once'));
    }
    this.started = true;

    return new Promise<ContainerInfo>((resolve, reject) => {
      let settled = false;

      const timer = setTimeout(() => {
        const error = new TimeoutError(this.timeoutMs);
        this.state.status = ParseStatus.TIMED_OUT;
        this.controller.abort(error);
        finish(() => reject(error));
      }, this.timeoutMs);

      const finish = (settle: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        settle();
      };

      this.readLoop().then(
        (info) => finish(() => resolve(info)),
        (error: unknown) => finish(() => reject(ProbeError.fromError(error)))
      );
    });
  }

  private async readLoop(): Promise<ContainerInfo> {
    const { signal } = this.controller;
    const size = this.source.size;
    const totalChunks = Math.ceil(size / this.chunkSize);
    let chunk = 0;

    while (this.state.offset < size) {
      const start = this.state.offset;

      let window: Uint8Array;
      try {
        window = await this.source.read(start, this.chunkSize, signal);
      } catch (error) {
        throw this.fail(new ReadError(errorMessage(error), { cause: error }));
      }
      if (signal.aborted) {
        throw this.fail(new ReadError('read aborted'));
      }
      if (window.length === 0) {
        throw this.fail(new ReadError(`unexpected end of data at offset ${start}`));
      }

      chunk += 1;
      this.state.offset = start + window.length;
      this.state.bytesRead += window.length;
      this.reportProgress(chunk, totalChunks);

      const info = this.settle(this.parser.append(window, start));
      if (info) {
        return info;
      }
    }

    const info = this.settle(this.parser.flush());
    if (!info) {
      throw this.fail(new ParseError('parser did not finish'));
    }
    return info;
  }

  /**
   * Terminal parser outcome as a result or a thrown ParseError; undefined while reading
   */
  private settle(progress: ParseProgress): ContainerInfo | undefined {
    switch (progress.status) {
      case ParseStatus.READY:
        if (this.state.status === ParseStatus.READING) {
          this.state.status = ParseStatus.READY;
        }
        return progress.info;
      case ParseStatus.FAILED:
        throw this.fail(new ParseError(progress.reason));
      default:
        return undefined;
    }
  }

  private fail(error: ProbeError): ProbeError {
    // A timeout has already decided the outcome
    if (this.state.status === ParseStatus.READING) {
      this.state.status = ParseStatus.FAILED;
    }
    return error;
  }

  private reportProgress(chunk: number, totalChunks: number): void {
    const message =
      `Reading ${this.source.name}: chunk ${chunk}/${totalChunks} ` +
      `(${formatMiB(this.state.bytesRead)} of ${formatMiB(this.source.size)})`;
    this.logger.debug(message);

    if (chunk === 1 || chunk % PROGRESS_EVERY === 0 || chunk === totalChunks) {
      this.options.timeline?.append(message);
    }
  }
}
