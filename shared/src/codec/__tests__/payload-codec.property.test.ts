/**
 * Property Tests for the fallback payload encoding
 *
 * Property 4: Fallback Round Trip
 * For any batch, decoding the encoded batch, or the results parameter of the
 * fallback URL, yields the original batch. Holds for non-ASCII file names.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  buildFallbackUrl,
  decodeBatch,
  decodeResults,
  encodeBatch,
} from '../payload-codec';
import { Flag } from '../../enums';
import type { ResultBatch } from '../../schema/result-batch';

const flagArbitrary = fc.constantFrom(Flag.PASS, Flag.FAIL);

const nameArbitrary = fc.oneof(
  fc.string({ minLength: 1, maxLength: 30 }),
  fc.fullUnicodeString({ minLength: 1, maxLength: 30 }),
  fc.constantFrom('vidéo été.mov', '動画ファイル.mp4', 'клип 01.mp4', '🎬 final.m4v')
);

const recordArbitrary = fc.record({
  name: nameArbitrary,
  byteSize: fc.integer({ min: 0, max: 2 ** 31 - 1 }),
  containerFormat: fc.constantFrom('mp4', 'mov', 'avi', 'error', 'mkv'),
  videoCodec: fc.constantFrom('h264', 'hevc', 'unknown', 'error', 'mp4v'),
  audioCodec: fc.oneof(
    fc.constantFrom('aac', 'none', 'unknown', 'Processing timeout'),
    fc.fullUnicodeString({ maxLength: 20 })
  ),
  formatFlag: flagArbitrary,
  codecFlag: flagArbitrary,
  sizeFlag: flagArbitrary,
});

const batchArbitrary: fc.Arbitrary<ResultBatch> = fc.record({
  metadata: fc.array(recordArbitrary, { maxLength: 12 }),
  timeline: fc.array(fc.fullUnicodeString({ maxLength: 60 }), { maxLength: 20 }),
});

describe('Payload Codec Property Tests', () => {
  describe('Property 4: Fallback Round Trip', () => {
    it('should decode an encoded batch back to the same batch', () => {
      fc.assert(
        fc.property(batchArbitrary, (batch) => {
          expect(decodeBatch(encodeBatch(batch))).toEqual(batch);
        }),
        { numRuns: 200 }
      );
    });

    it('should decode the results parameter of a fallback URL', () => {
      fc.assert(
        fc.property(
          batchArbitrary,
          fc.constantFrom(
            'http://localhost:8501/',
            'https://host.example/app?tab=check',
            'https://host.example/app#results-view'
          ),
          (batch, baseUrl) => {
            expect(decodeResults(buildFallbackUrl(baseUrl, batch))).toEqual(batch);
          }
        ),
        { numRuns: 100 }
      );
    });

    it('should encode equal batches to equal strings', () => {
      fc.assert(
        fc.property(batchArbitrary, (batch) => {
          const copy: ResultBatch = {
            timeline: [...batch.timeline],
            metadata: batch.metadata.map((record) => ({ ...record })),
          };
          expect(encodeBatch(copy)).toBe(encodeBatch(batch));
        })
      );
    });
  });
});
