// Builders for small synthetic ISO-BMFF files used by the probe tests

export function fourcc(type: string): Uint8Array {
  if (type.length !== 4) {
    throw new Error(`box type must be four characters: ${type}`);
  }
  return Uint8Array.from(type, (char) => char.charCodeAt(0));
}

function uint32(value: number): Uint8Array {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, value);
  return bytes;
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const merged = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    merged.set(part, offset);
    offset += part.length;
  }
  return merged;
}

export function box(type: string, ...payload: Uint8Array[]): Uint8Array {
  const body = concatBytes(...payload);
  return concatBytes(uint32(8 + body.length), fourcc(type), body);
}

/** Box with a 64-bit largesize header */
export function largeBox(type: string, ...payload: Uint8Array[]): Uint8Array {
  const body = concatBytes(...payload);
  const header = new Uint8Array(16);
  const view = new DataView(header.buffer);
  view.setUint32(0, 1);
  header.set(fourcc(type), 4);
  view.setBigUint64(8, BigInt(16 + body.length));
  return concatBytes(header, body);
}

/** Box whose size field is 0: it runs to the end of the file */
export function openEndedBox(type: string, ...payload: Uint8Array[]): Uint8Array {
  return concatBytes(uint32(0), fourcc(type), ...payload);
}

export function ftyp(brand: string, ...compatible: string[]): Uint8Array {
  return box('ftyp', fourcc(brand), uint32(0), ...compatible.map(fourcc));
}

export function track(handler: string, codec: string): Uint8Array {
  const hdlr = box('hdlr', uint32(0), uint32(0), fourcc(handler), new Uint8Array(12));
  const sampleEntry = box(codec, new Uint8Array(8));
  const stsd = box('stsd', uint32(0), uint32(1), sampleEntry);
  return box('trak', box('tkhd', new Uint8Array(12)), box('mdia', hdlr, box('minf', box('stbl', stsd))));
}

export function moov(...tracks: Uint8Array[]): Uint8Array {
  return box('moov', box('mvhd', new Uint8Array(12)), ...tracks);
}

export function mdat(length: number): Uint8Array {
  return box('mdat', new Uint8Array(length));
}

/**
 * A typical progressive file: ftyp, moov with the given tracks, then media data
 */
export function movieFile(options: {
  brand?: string;
  video?: string;
  audio?: string;
  mediaBytes?: number;
  moovFirst?: boolean;
}): Uint8Array {
  const tracks: Uint8Array[] = [];
  if (options.video) {
    tracks.push(track('vide', options.video));
  }
  if (options.audio) {
    tracks.push(track('soun', options.audio));
  }
  const header = options.brand ? [ftyp(options.brand, 'isom', 'mp41')] : [];
  const movie = moov(...tracks);
  const media = mdat(options.mediaBytes ?? 64);
  return options.moovFirst === false
    ? concatBytes(...header, media, movie)
    : concatBytes(...header, movie, media);
}
