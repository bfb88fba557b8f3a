import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Flag, ProbeTimeline, errorRecord, type FileRecord } from '@media-preflight/shared';
import { ProbeService } from '../probe.service';
import { ProbeConfigService } from '../../config/probe.config';
import { MemoryByteSource, type ByteSource } from '../sources/byte-source';
import { createMockConfigService } from '@/__mocks__/config.service';
import { concatBytes, fourcc, ftyp, moov, movieFile, track } from '@/__fixtures__/iso-boxes';

vi.mock('@nestjs/common', async () => {
  const actual = await vi.importActual('@nestjs/common');
  const { MockLogger } = await import('@/__mocks__/logger');
  return {
    ...actual,
    Logger: MockLogger,
  };
});

const MiB = 1024 * 1024;

/**
 * Reports `size` bytes; reads past the stored head return zeros
 */
class SparseByteSource implements ByteSource {
  readonly close = vi.fn(async () => undefined);

  constructor(
    readonly name: string,
    readonly size: number,
    private readonly head: Uint8Array
  ) {}

  async read(offset: number, length: number): Promise<Uint8Array> {
    const window = new Uint8Array(Math.min(length, this.size - offset));
    window.set(this.head.subarray(offset, offset + window.length));
    return window;
  }
}

/** A QuickTime file of `size` bytes whose media data follows the movie box */
function largeQuickTime(name: string, size: number): SparseByteSource {
  const head = concatBytes(ftyp('qt  ', 'qt  '), moov(track('vide', 'hvc1'), track('soun', 'mp4a')));
  const mdatHeader = new Uint8Array(8);
  new DataView(mdatHeader.buffer).setUint32(0, size - head.length);
  mdatHeader.set(fourcc('mdat'), 4);
  return new SparseByteSource(name, size, concatBytes(head, mdatHeader));
}

class HangingByteSource implements ByteSource {
  readonly size = 2 * MiB;
  readonly close = vi.fn(async () => undefined);

  constructor(readonly name: string) {}

  read(_offset: number, _length: number, signal?: AbortSignal): Promise<Uint8Array> {
    return new Promise((_resolve, reject) => {
      signal?.addEventListener('abort', () => reject(signal.reason));
    });
  }
}

describe('ProbeService', () => {
  let service: ProbeService;
  let timeline: ProbeTimeline;

  beforeEach(() => {
    const configService = createMockConfigService({
      probe: {
        chunkSizeBytes: 1 * MiB,
        fileTimeoutMs: 30,
        supportedExtensions: ['mp4', 'mov', 'm4v'],
      },
    });
    service = new ProbeService(new ProbeConfigService(configService));
    timeline = new ProbeTimeline({ now: () => 0 });
  });

  describe('runBatch', () => {
    it('returns one record per input in input order', async () => {
      const inputs: ByteSource[] = [
        new MemoryByteSource('clip.mp4', movieFile({ brand: 'isom', video: 'avc1', audio: 'mp4a' })),
        largeQuickTime('big.mov', 250 * MiB),
        new MemoryByteSource('notes.avi', new Uint8Array(3 * MiB)),
      ];

      const records = await service.runBatch(inputs, { timeline });

      expect(records.map((record) => record.name)).toEqual(['clip.mp4', 'big.mov', 'notes.avi']);
      expect(records[0]).toMatchObject({
        containerFormat: 'mp4',
        videoCodec: 'h264',
        audioCodec: 'aac',
        formatFlag: Flag.PASS,
        codecFlag: Flag.PASS,
        sizeFlag: Flag.PASS,
      });
      expect(records[1]).toEqual({
        name: 'big.mov',
        byteSize: 250 * MiB,
        containerFormat: 'mov',
        videoCodec: 'hevc',
        audioCodec: 'aac',
        formatFlag: Flag.PASS,
        codecFlag: Flag.PASS,
        sizeFlag: Flag.FAIL,
      });
      expect(records[2]).toEqual({
        name: 'notes.avi',
        byteSize: 3 * MiB,
        containerFormat: 'avi',
        videoCodec: 'unknown',
        audioCodec: 'unknown',
        formatFlag: Flag.FAIL,
        codecFlag: Flag.FAIL,
        sizeFlag: Flag.PASS,
      });
    });

    it('keeps going after a file times out', async () => {
      const stuck = new HangingByteSource('stuck.mp4');
      const records = await service.runBatch(
        [stuck, new MemoryByteSource('after.mp4', movieFile({ brand: 'isom', video: 'avc1' }))],
        { timeline }
      );

      expect(records[0]).toEqual(errorRecord('stuck.mp4', 2 * MiB, 'Processing timeout'));
      expect(records[1].formatFlag).toBe(Flag.PASS);
      expect(stuck.close).toHaveBeenCalledTimes(1);
    });

    it('writes the batch steps to the timeline', async () => {
      await service.runBatch(
        [new MemoryByteSource('clip.mp4', movieFile({ brand: 'isom', video: 'avc1' }))],
        { timeline }
      );

      const entries = timeline.entries.map((entry) => entry.slice('1970-01-01T00:00:00.000Z '.length));
      expect(entries[0]).toBe('Selected 1 file(s). Starting analysis...');
      expect(entries[1]).toBe('Processing file 1: clip.mp4');
      expect(entries).toContain('Parsed clip.mp4 -> format: mp4, video: h264, audio: none');
      expect(entries[entries.length - 1]).toBe(
        'Analysis complete. Preparing 1 result(s) for return.'
      );
    });

    it('returns an empty list for no inputs', async () => {
      await expect(service.runBatch([])).resolves.toEqual([]);
    });
  });

  describe('probe', () => {
    it('uses the extension as brand when the file has no ftyp', async () => {
      const record = await service.probe(
        new MemoryByteSource('legacy.mov', movieFile({ video: 'avc1' }))
      );
      expect(record.containerFormat).toBe('mov');
      expect(record.formatFlag).toBe(Flag.PASS);
    });

    it('records a parse failure in the audio slot', async () => {
      const record = await service.probe(new MemoryByteSource('odd.mp4', ftyp('isom')), { timeline });
      expect(record).toEqual(
        errorRecord('odd.mp4', 16, 'Container parse error: no movie box found before end of input')
      );
      expect(timeline.entries[timeline.size - 1]).toBe(
        '1970-01-01T00:00:00.000Z Error on odd.mp4: Container parse error: no movie box found before end of input'
      );
    });

    it('records a read failure', async () => {
      const source: ByteSource = {
        name: 'gone.mp4',
        size: 10,
        read: () => Promise.reject(new Error('EIO')),
      };
      const record: FileRecord = await service.probe(source);
      expect(record.audioCodec).toBe('File read error: EIO');
      expect(record.containerFormat).toBe('error');
    });

    it('applies a policy override', async () => {
      const record = await service.probe(
        new MemoryByteSource('clip.mp4', movieFile({ brand: 'isom', video: 'avc1' })),
        { policy: { allowedFormats: ['mov'], allowedVideoCodecs: ['h264'], maxSizeMiB: 1 } }
      );
      expect(record.formatFlag).toBe(Flag.FAIL);
      expect(record.codecFlag).toBe(Flag.PASS);
    });

    it('closes the source after probing', async () => {
      const source = largeQuickTime('big.mov', 10 * MiB);
      await service.probe(source);
      expect(source.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('files on disk', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'probe-service-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('probes a file by path', async () => {
      const filePath = path.join(dir, 'clip.m4v');
      const bytes = movieFile({ brand: 'M4V ', video: 'avc1', audio: 'mp4a' });
      await fs.writeFile(filePath, bytes);

      await expect(service.probe(filePath)).resolves.toEqual({
        name: 'clip.m4v',
        byteSize: bytes.length,
        containerFormat: 'mp4',
        videoCodec: 'h264',
        audioCodec: 'aac',
        formatFlag: Flag.PASS,
        codecFlag: Flag.PASS,
        sizeFlag: Flag.PASS,
      });
    });

    it('returns an error record for a missing file', async () => {
      const record = await service.probe(path.join(dir, 'missing.mp4'));
      expect(record.name).toBe('missing.mp4');
      expect(record.byteSize).toBe(0);
      expect(record.audioCodec.startsWith('File read error: ENOENT')).toBe(true);
    });
  });
});
