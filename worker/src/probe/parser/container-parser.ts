import { ParseStatus } from '@media-preflight/shared';
import {
  findChild,
  listChildBoxes,
  readBoxHeader,
  readFourCC,
  type ChildBox,
} from './box-reader';

export interface ContainerInfo {
  /** Major brand from `ftyp`; undefined when the file has no `ftyp` */
  brand: string | undefined;
  compatibleBrands: string[];
  /** Sample entry type of the first video track */
  videoCodec?: string;
  /** Sample entry type of the first audio track */
  audioCodec?: string;
}

export type ParseProgress =
  | { status: ParseStatus.READING }
  | { status: ParseStatus.READY; info: ContainerInfo }
  | { status: ParseStatus.FAILED; reason: string };

export interface ContainerParserOptions {
  /** Upper bound for a buffered `ftyp` or `moov` box */
  maxMetadataBoxBytes?: number;
}

export const DEFAULT_MAX_METADATA_BOX_BYTES = 64 * 1024 * 1024;

// Top-level boxes whose payload we buffer; everything else is skipped
const METADATA_BOXES = new Set(['ftyp', 'moov']);

const READING: ParseProgress = { status: ParseStatus.READING };
const EMPTY = new Uint8Array(0);

/**
 * Incremental ISO-BMFF / QuickTime scanner.
 *
 * Windows are appended with their absolute file offset, in non-decreasing,
 * non-overlapping order. Top-level boxes other than `ftyp` and `moov` are
 * skipped without buffering. The parser reports `ready` as soon as the movie
 * box has been read, which may be long before the end of the file, and
 * `failed` on malformed input or when input ends without a movie box.
 * Exactly one terminal outcome is produced; later input is ignored.
 */
export class IncrementalContainerParser {
  private readonly maxMetadataBoxBytes: number;

  /** Buffered bytes, starting at absolute offset `pendingStart` */
  private pending: Uint8Array = EMPTY;
  private pendingStart = 0;
  /** Absolute offset of the next top-level box header */
  private cursor = 0;
  /** End of the last appended window */
  private inputEnd = 0;
  /** Type of a metadata box whose bytes are still arriving */
  private awaitingBox: string | undefined;

  private brand: string | undefined;
  private compatibleBrands: string[] = [];
  private outcome: ParseProgress = READING;

  constructor(options: ContainerParserOptions = {}) {
    this.maxMetadataBoxBytes =
      options.maxMetadataBoxBytes ?? DEFAULT_MAX_METADATA_BOX_BYTES;
  }

  get progress(): ParseProgress {
    return this.outcome;
  }

  /**
   * Feed the window that starts at `fileStart`.
   *
   * @throws RangeError when the window starts before the end of earlier input
   */
  append(window: Uint8Array, fileStart: number): ParseProgress {
    if (this.outcome.status !== ParseStatus.READING) {
      return this.outcome;
    }
    if (fileStart < this.inputEnd) {
      throw new RangeError(
        `Window at offset ${fileStart} overlaps input already received up to ${this.inputEnd}`
      );
    }
    if (window.length === 0) {
      return this.outcome;
    }

    const windowEnd = fileStart + window.length;
    this.inputEnd = windowEnd;

    // Entirely inside a box we are skipping
    if (windowEnd <= this.cursor) {
      return this.outcome;
    }

    const pendingEnd = this.pendingStart + this.pending.length;
    if (this.pending.length > 0) {
      if (fileStart !== pendingEnd) {
        return this.fail(`missing bytes between offsets ${pendingEnd} and ${fileStart}`);
      }
      this.pending = concat(this.pending, window);
    } else {
      if (fileStart > this.cursor) {
        return this.fail(`missing bytes between offsets ${this.cursor} and ${fileStart}`);
      }
      this.pending = window.slice(this.cursor - fileStart);
      this.pendingStart = this.cursor;
    }

    return this.scan();
  }

  /**
   * End of input. Fails unless the movie box has already been read.
   */
  flush(): ParseProgress {
    if (this.outcome.status !== ParseStatus.READING) {
      return this.outcome;
    }
    if (this.awaitingBox) {
      return this.fail(`truncated '${this.awaitingBox}' box at offset ${this.cursor}`);
    }
    return this.fail('no movie box found before end of input');
  }

  private scan(): ParseProgress {
    for (;;) {
      if (this.cursor > this.pendingStart) {
        const drop = this.cursor - this.pendingStart;
        if (drop >= this.pending.length) {
          this.pending = EMPTY;
          this.pendingStart = this.cursor;
          return this.outcome;
        }
        this.pending = this.pending.subarray(drop);
        this.pendingStart = this.cursor;
      }

      const result = readBoxHeader(this.pending, 0);
      if (result.kind === 'need-more') {
        return this.outcome;
      }
      if (result.kind === 'invalid') {
        return this.fail(`${result.reason} at offset ${this.cursor}`);
      }

      const { header } = result;

      if (!METADATA_BOXES.has(header.type)) {
        // size undefined: the box runs to end of file, nothing follows it
        this.cursor =
          header.size === undefined
            ? Number.POSITIVE_INFINITY
            : this.cursor + header.size;
        continue;
      }

      if (header.size === undefined) {
        return this.fail(`open-ended '${header.type}' box is not supported`);
      }
      if (header.size > this.maxMetadataBoxBytes) {
        return this.fail(
          `'${header.type}' box of ${header.size} bytes exceeds the ${this.maxMetadataBoxBytes} byte limit`
        );
      }
      if (this.pending.length < header.size) {
        this.awaitingBox = header.type;
        return this.outcome;
      }
      this.awaitingBox = undefined;

      const box: ChildBox = {
        type: header.type,
        start: header.headerSize,
        end: header.size,
      };

      if (header.type === 'ftyp') {
        this.readFileType(this.pending, box);
        this.cursor += header.size;
        continue;
      }

      return this.ready(this.readMovie(this.pending, box));
    }
  }

  private readFileType(bytes: Uint8Array, ftyp: ChildBox): void {
    if (ftyp.end - ftyp.start < 8) {
      return;
    }
    this.brand = readFourCC(bytes, ftyp.start);
    const brands: string[] = [];
    for (let offset = ftyp.start + 8; offset + 4 <= ftyp.end; offset += 4) {
      brands.push(readFourCC(bytes, offset));
    }
    this.compatibleBrands = brands;
  }

  private readMovie(bytes: Uint8Array, moov: ChildBox): ContainerInfo {
    const info: ContainerInfo = {
      brand: this.brand,
      compatibleBrands: this.compatibleBrands,
    };

    for (const trak of listChildBoxes(bytes, moov.start, moov.end)) {
      if (trak.type !== 'trak') {
        continue;
      }
      const track = readTrack(bytes, trak);
      if (!track.codec) {
        continue;
      }
      if (track.handler === 'vide' && info.videoCodec === undefined) {
        info.videoCodec = track.codec;
      } else if (track.handler === 'soun' && info.audioCodec === undefined) {
        info.audioCodec = track.codec;
      }
    }

    return info;
  }

  private ready(info: ContainerInfo): ParseProgress {
    this.outcome = { status: ParseStatus.READY, info };
    this.release();
    return this.outcome;
  }

  private fail(reason: string): ParseProgress {
    this.outcome = { status: ParseStatus.FAILED, reason };
    this.release();
    return this.outcome;
  }

  private release(): void {
    this.pending = EMPTY;
    this.awaitingBox = undefined;
  }
}

interface TrackSummary {
  handler: string | undefined;
  codec: string | undefined;
}

/**
 * Handler type from trak/mdia/hdlr and the first sample entry type from
 * trak/mdia/minf/stbl/stsd
 */
function readTrack(bytes: Uint8Array, trak: ChildBox): TrackSummary {
  const mdia = findChild(bytes, trak, 'mdia');
  if (!mdia) {
    return { handler: undefined, codec: undefined };
  }

  // hdlr: version/flags(4) pre_defined(4) handler_type(4)
  const hdlr = findChild(bytes, mdia, 'hdlr');
  const handler =
    hdlr && hdlr.end - hdlr.start >= 12 ? readFourCC(bytes, hdlr.start + 8) : undefined;

  const minf = findChild(bytes, mdia, 'minf');
  const stbl = minf && findChild(bytes, minf, 'stbl');
  const stsd = stbl && findChild(bytes, stbl, 'stsd');

  // stsd: version/flags(4) entry_count(4) then entries of size(4) type(4)
  const codec =
    stsd && stsd.end - stsd.start >= 16 ? readFourCC(bytes, stsd.start + 12) : undefined;

  return { handler, codec };
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  const merged = new Uint8Array(a.length + b.length);
  merged.set(a, 0);
  merged.set(b, a.length);
  return merged;
}
