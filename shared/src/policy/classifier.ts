/**
 * Metadata normalizer and policy classifier
 *
 * Maps the raw identifiers a container probe reports (brand, sample entry
 * four-character codes, or names from any other probing source) to canonical
 * tags, then evaluates the validation policy against them. Everything here is
 * pure: the same input always yields an equal FileRecord.
 */

import { CANONICAL_CODECS, CANONICAL_FORMATS, Flag } from '../enums';
import type { FileRecord } from '../schema/file-record';
import { toMiB } from '../utils/file-size';

export interface ValidationPolicy {
  allowedFormats: readonly string[];
  allowedVideoCodecs: readonly string[];
  maxSizeMiB: number;
}

export const DEFAULT_POLICY: ValidationPolicy = Object.freeze({
  allowedFormats: Object.freeze(['mp4', 'mov']),
  allowedVideoCodecs: Object.freeze([
    'h264',
    'avc',
    'hevc',
    'h265',
    'mpeg1video',
    'mpeg2video',
    'mpeg1',
    'mpeg2',
  ]),
  maxSizeMiB: 200,
});

/**
 * Raw identifiers from a probe. Any source producing this triple
 * (container parser, external probing binary) can be classified.
 */
export interface ClassificationInput {
  name: string;
  byteSize: number;
  rawBrand: string;
  rawVideoCodec?: string;
  rawAudioCodec?: string;
}

export interface NormalizedMetadata {
  containerFormat: string;
  videoCodec: string;
  audioCodec: string;
}

export interface PolicyFlags {
  formatFlag: Flag;
  codecFlag: Flag;
  sizeFlag: Flag;
}

export const UNKNOWN_CODEC = 'unknown';
export const NO_AUDIO = 'none';
export const ERROR_TAG = 'error';

interface MarkerRule {
  markers: readonly string[];
  tag: string;
}

// Order matters: the first rule with a matching marker wins
const BRAND_RULES: readonly MarkerRule[] = [
  { markers: ['qt'], tag: CANONICAL_FORMATS.MOV },
  {
    markers: ['mp4', 'isom', 'iso', 'm4v', 'avc1', 'dash'],
    tag: CANONICAL_FORMATS.MP4,
  },
];

const VIDEO_CODEC_RULES: readonly MarkerRule[] = [
  { markers: ['avc', 'h264'], tag: CANONICAL_CODECS.H264 },
  { markers: ['hvc', 'hev', 'h265'], tag: CANONICAL_CODECS.HEVC },
];

const AUDIO_CODEC_RULES: readonly MarkerRule[] = [
  { markers: ['mp4a'], tag: CANONICAL_CODECS.AAC },
];

function matchRule(value: string, rules: readonly MarkerRule[]): string | undefined {
  const lowered = value.toLowerCase();
  return rules.find((rule) =>
    rule.markers.some((marker) => lowered.includes(marker))
  )?.tag;
}

/**
 * Canonical container format for a brand; unmatched brands pass through
 * trimmed and lower-cased
 *
 * @example
 * normalizeBrand('qt  ') // 'mov'
 * normalizeBrand('isom') // 'mp4'
 * normalizeBrand('3gp5') // '3gp5'
 */
export function normalizeBrand(rawBrand: string): string {
  const brand = rawBrand.trim().toLowerCase();
  return matchRule(brand, BRAND_RULES) ?? brand;
}

export function normalizeVideoCodec(rawCodec: string | undefined): string {
  const codec = rawCodec?.trim() ?? '';
  if (codec === '') {
    return UNKNOWN_CODEC;
  }
  return matchRule(codec, VIDEO_CODEC_RULES) ?? codec;
}

export function normalizeAudioCodec(rawCodec: string | undefined): string {
  if (rawCodec === undefined) {
    return NO_AUDIO;
  }
  const codec = rawCodec.trim();
  if (codec === '') {
    return UNKNOWN_CODEC;
  }
  return matchRule(codec, AUDIO_CODEC_RULES) ?? codec;
}

export function normalizeMetadata(input: ClassificationInput): NormalizedMetadata {
  return {
    containerFormat: normalizeBrand(input.rawBrand),
    videoCodec: normalizeVideoCodec(input.rawVideoCodec),
    audioCodec: normalizeAudioCodec(input.rawAudioCodec),
  };
}

function flagOf(passed: boolean): Flag {
  return passed ? Flag.PASS : Flag.FAIL;
}

/**
 * Evaluate the three policy rules independently.
 * Format and codec comparisons are case-insensitive.
 */
export function evaluatePolicy(
  metadata: Pick<NormalizedMetadata, 'containerFormat' | 'videoCodec'>,
  byteSize: number,
  policy: ValidationPolicy = DEFAULT_POLICY
): PolicyFlags {
  const format = metadata.containerFormat.toLowerCase();
  const codec = metadata.videoCodec.toLowerCase();

  return {
    formatFlag: flagOf(
      policy.allowedFormats.some((allowed) => allowed.toLowerCase() === format)
    ),
    codecFlag: flagOf(
      policy.allowedVideoCodecs.some((allowed) => allowed.toLowerCase() === codec)
    ),
    sizeFlag: flagOf(toMiB(byteSize) <= policy.maxSizeMiB),
  };
}

/**
 * Build an immutable FileRecord from already-normalized values
 */
export function buildFileRecord(
  name: string,
  byteSize: number,
  metadata: NormalizedMetadata,
  policy: ValidationPolicy = DEFAULT_POLICY
): FileRecord {
  return Object.freeze({
    name,
    byteSize,
    containerFormat: metadata.containerFormat,
    videoCodec: metadata.videoCodec,
    audioCodec: metadata.audioCodec,
    ...evaluatePolicy(metadata, byteSize, policy),
  });
}

/**
 * Normalize raw probe identifiers and classify them against the policy
 *
 * @example
 * classify({ name: 'clip.mp4', byteSize: 52428800, rawBrand: 'isom', rawVideoCodec: 'avc1' })
 * // { containerFormat: 'mp4', videoCodec: 'h264', audioCodec: 'none', formatFlag: 'pass', ... }
 */
export function classify(
  input: ClassificationInput,
  policy: ValidationPolicy = DEFAULT_POLICY
): FileRecord {
  return buildFileRecord(input.name, input.byteSize, normalizeMetadata(input), policy);
}

/**
 * Record for a file whose extension is not a supported container family.
 * Only the extension and size are known; no parse is attempted.
 */
export function classifyInapplicable(
  name: string,
  byteSize: number,
  extension: string,
  policy: ValidationPolicy = DEFAULT_POLICY
): FileRecord {
  return buildFileRecord(
    name,
    byteSize,
    {
      containerFormat: extension.toLowerCase(),
      videoCodec: UNKNOWN_CODEC,
      audioCodec: UNKNOWN_CODEC,
    },
    policy
  );
}

/**
 * Record for a file whose probe failed. The reason goes in the audio codec slot.
 */
export function errorRecord(
  name: string,
  byteSize: number,
  reason: string,
  policy: ValidationPolicy = DEFAULT_POLICY
): FileRecord {
  return buildFileRecord(
    name,
    byteSize,
    { containerFormat: ERROR_TAG, videoCodec: ERROR_TAG, audioCodec: reason },
    policy
  );
}
