/**
 * Property Tests for the incremental container parser
 *
 * Property 5: Window Size Independence
 * For any well-formed file and any split of its bytes into ascending windows,
 * the parser reports the same outcome as for the whole file at once.
 *
 * Property 6: Single Terminal Outcome
 * Once the parser has reported ready or failed, further windows and flush
 * return that same outcome.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ParseStatus } from '@media-preflight/shared';
import { IncrementalContainerParser } from '../container-parser';
import { movieFile } from '@/__fixtures__/iso-boxes';

const fileArbitrary = fc
  .record({
    brand: fc.option(fc.constantFrom('isom', 'mp42', 'qt  ', 'M4V '), { nil: undefined }),
    video: fc.option(fc.constantFrom('avc1', 'hvc1', 'mp4v', 'ap4h'), { nil: undefined }),
    audio: fc.option(fc.constantFrom('mp4a', 'ac-3', 'lpcm'), { nil: undefined }),
    mediaBytes: fc.integer({ min: 0, max: 2000 }),
    moovFirst: fc.boolean(),
  })
  .map((options) => movieFile(options));

/** Split points as ascending offsets into the file */
function splitArbitrary(length: number) {
  return fc
    .uniqueArray(fc.integer({ min: 1, max: Math.max(1, length - 1) }), { maxLength: 20 })
    .map((points) => [0, ...points.filter((p) => p < length).sort((a, b) => a - b), length]);
}

function parseInWindows(bytes: Uint8Array, boundaries: number[]) {
  const parser = new IncrementalContainerParser();
  for (let i = 0; i + 1 < boundaries.length; i++) {
    parser.append(bytes.subarray(boundaries[i], boundaries[i + 1]), boundaries[i]);
  }
  return { parser, outcome: parser.flush() };
}

describe('Container Parser Property Tests', () => {
  describe('Property 5: Window Size Independence', () => {
    it('should report the same outcome for any split of the input', () => {
      fc.assert(
        fc.property(
          fileArbitrary.chain((bytes) =>
            fc.tuple(fc.constant(bytes), splitArbitrary(bytes.length))
          ),
          ([bytes, boundaries]) => {
            const whole = parseInWindows(bytes, [0, bytes.length]).outcome;
            const split = parseInWindows(bytes, boundaries).outcome;
            expect(whole.status).toBe(ParseStatus.READY);
            expect(split).toEqual(whole);
          }
        ),
        { numRuns: 150 }
      );
    });
  });

  describe('Property 6: Single Terminal Outcome', () => {
    it('should keep the first terminal outcome', () => {
      fc.assert(
        fc.property(fileArbitrary, fc.uint8Array({ maxLength: 64 }), (bytes, trailing) => {
          const { parser, outcome } = parseInWindows(bytes, [0, bytes.length]);
          expect(parser.append(trailing, bytes.length)).toBe(outcome);
          expect(parser.flush()).toBe(outcome);
        })
      );
    });
  });
});
