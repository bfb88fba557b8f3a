/**
 * Low-level ISO-BMFF / QuickTime box helpers
 *
 * A box starts with a 32-bit big-endian size and a four-character type.
 * size == 1 means a 64-bit size follows the type; size == 0 means the box
 * runs to the end of the file.
 */

export const BOX_HEADER_SIZE = 8;
export const LARGE_BOX_HEADER_SIZE = 16;

export interface BoxHeader {
  type: string;
  /** Total box size including the header; undefined when the box runs to end of file */
  size: number | undefined;
  headerSize: number;
}

export type HeaderResult =
  | { kind: 'header'; header: BoxHeader }
  | { kind: 'need-more' }
  | { kind: 'invalid'; reason: string };

export function readUint32(bytes: Uint8Array, offset: number): number {
  return (
    ((bytes[offset] << 24) >>> 0) +
    (bytes[offset + 1] << 16) +
    (bytes[offset + 2] << 8) +
    bytes[offset + 3]
  );
}

export function readFourCC(bytes: Uint8Array, offset: number): string {
  return String.fromCharCode(
    bytes[offset],
    bytes[offset + 1],
    bytes[offset + 2],
    bytes[offset + 3]
  );
}

function isPrintableFourCC(bytes: Uint8Array, offset: number): boolean {
  for (let i = offset; i < offset + 4; i++) {
    // QuickTime uses 0xA9 ('©') as a leading character in metadata atoms
    if ((bytes[i] < 0x20 || bytes[i] > 0x7e) && bytes[i] !== 0xa9) {
      return false;
    }
  }
  return true;
}

/**
 * Parse the box header at `offset`, which must lie within `bytes`.
 * `available` is the number of bytes from `offset` that are present.
 */
export function readBoxHeader(bytes: Uint8Array, offset: number): HeaderResult {
  const available = bytes.length - offset;
  if (available < BOX_HEADER_SIZE) {
    return { kind: 'need-more' };
  }

  if (!isPrintableFourCC(bytes, offset + 4)) {
    return { kind: 'invalid', reason: 'invalid box type' };
  }

  const size32 = readUint32(bytes, offset);
  const type = readFourCC(bytes, offset + 4);

  if (size32 === 0) {
    return { kind: 'header', header: { type, size: undefined, headerSize: BOX_HEADER_SIZE } };
  }

  if (size32 === 1) {
    if (available < LARGE_BOX_HEADER_SIZE) {
      return { kind: 'need-more' };
    }
    const high = readUint32(bytes, offset + 8);
    const low = readUint32(bytes, offset + 12);
    const size = high * 2 ** 32 + low;
    if (!Number.isSafeInteger(size) || size < LARGE_BOX_HEADER_SIZE) {
      return { kind: 'invalid', reason: `invalid size for box '${type}'` };
    }
    return { kind: 'header', header: { type, size, headerSize: LARGE_BOX_HEADER_SIZE } };
  }

  if (size32 < BOX_HEADER_SIZE) {
    return { kind: 'invalid', reason: `invalid size ${size32} for box '${type}'` };
  }

  return { kind: 'header', header: { type, size: size32, headerSize: BOX_HEADER_SIZE } };
}

export interface ChildBox {
  type: string;
  /** Payload start, relative to the buffer */
  start: number;
  /** Payload end (exclusive), relative to the buffer */
  end: number;
}

/**
 * Children of a container box whose payload spans [start, end) of `bytes`.
 * Stops at the first malformed child rather than reading past the parent.
 */
export function listChildBoxes(bytes: Uint8Array, start: number, end: number): ChildBox[] {
  const children: ChildBox[] = [];
  let cursor = start;

  while (cursor + BOX_HEADER_SIZE <= end) {
    const result = readBoxHeader(bytes.subarray(0, end), cursor);
    if (result.kind !== 'header') {
      break;
    }
    const { header } = result;
    const boxEnd = header.size === undefined ? end : cursor + header.size;
    if (boxEnd > end) {
      break;
    }
    children.push({ type: header.type, start: cursor + header.headerSize, end: boxEnd });
    cursor = boxEnd;
  }

  return children;
}

export function findChild(
  bytes: Uint8Array,
  parent: Pick<ChildBox, 'start' | 'end'>,
  type: string
): ChildBox | undefined {
  return listChildBoxes(bytes, parent.start, parent.end).find((child) => child.type === type);
}
