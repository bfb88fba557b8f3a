/**
 * Compact text encoding of a result batch
 *
 * Used by the redirect channel: JSON → UTF-8 bytes → base64, then
 * percent-encoded into a query parameter of the host's own URL. The host
 * decodes the same parameter back into a batch.
 */

import {
  InboundBatchSchema,
  type BridgePayload,
  type ResultBatch,
} from '../schema/result-batch';
import { DecodeError, errorMessage } from '../utils/errors';

export const RESULTS_PARAM = 'results';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Encode a batch as base64 of its UTF-8 JSON. Field order is fixed so equal
 * batches encode to equal strings.
 */
export function encodeBatch(batch: ResultBatch): string {
  const json = JSON.stringify({
    metadata: batch.metadata,
    timeline: batch.timeline,
  });
  return Buffer.from(json, 'utf8').toString('base64');
}

/**
 * Outbound payload for the direct and message channels
 */
export function toBridgePayload(batch: ResultBatch): BridgePayload {
  return {
    metadata: [...batch.metadata],
    timeline: [...batch.timeline],
    payloadSizeHint: encodeBatch(batch).length,
  };
}

/**
 * Host URL carrying the encoded batch as a query parameter.
 * A fragment on the base URL is kept after the query.
 *
 * @example
 * buildFallbackUrl('http://localhost:8501/', batch)
 * // 'http://localhost:8501/?results=eyJtZXRhZGF0YSI6W10sInRpbWVsaW5lIjpbXX0%3D'
 */
export function buildFallbackUrl(
  baseUrl: string,
  batch: ResultBatch,
  param: string = RESULTS_PARAM
): string {
  const hashIndex = baseUrl.indexOf('#');
  const base = hashIndex >= 0 ? baseUrl.slice(0, hashIndex) : baseUrl;
  const hash = hashIndex >= 0 ? baseUrl.slice(hashIndex) : '';
  const separator = base.includes('?') ? '&' : '?';
  return `${base}${separator}${param}=${encodeURIComponent(encodeBatch(batch))}${hash}`;
}

/**
 * Decode an encoded batch.
 *
 * @returns undefined when the value is absent or empty
 * @throws DecodeError when the value is not valid base64, UTF-8, JSON or batch shape
 */
export function decodeBatch(encoded: string | null | undefined): ResultBatch | undefined {
  if (encoded === null || encoded === undefined) {
    return undefined;
  }
  // form decoding turns an unescaped '+' into a space
  const value = encoded.trim().replace(/ /g, '+');
  if (value === '') {
    return undefined;
  }
  if (value.length % 4 !== 0 || !BASE64_PATTERN.test(value)) {
    throw new DecodeError('value is not valid base64');
  }

  let json: string;
  try {
    json = new TextDecoder('utf-8', { fatal: true }).decode(
      Buffer.from(value, 'base64')
    );
  } catch (error) {
    throw new DecodeError('payload is not valid UTF-8', { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new DecodeError(errorMessage(error), { cause: error });
  }

  const result = InboundBatchSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new DecodeError(
      `unexpected payload shape${issue ? ` at ${issue.path.join('.') || '<root>'}: ${issue.message}` : ''}`
    );
  }

  if (Array.isArray(result.data)) {
    return { metadata: result.data, timeline: [] };
  }
  return { metadata: result.data.metadata, timeline: result.data.timeline };
}

/**
 * Pull the encoded batch out of whatever the host was handed: a full URL, a
 * query string, or the bare (possibly still percent-encoded) parameter value.
 */
export function readResultsParam(
  input: string | null | undefined,
  param: string = RESULTS_PARAM
): string | undefined {
  const value = input?.trim();
  if (!value) {
    return undefined;
  }

  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) {
    let url: URL;
    try {
      url = new URL(value);
    } catch (error) {
      throw new DecodeError(`invalid URL: ${errorMessage(error)}`, { cause: error });
    }
    return url.searchParams.get(param) ?? undefined;
  }

  const query = value.startsWith('?') ? value.slice(1) : value;
  if (query.startsWith(`${param}=`) || query.includes(`&${param}=`)) {
    return new URLSearchParams(query).get(param) ?? undefined;
  }

  if (value.includes('%')) {
    try {
      return decodeURIComponent(value);
    } catch (error) {
      throw new DecodeError('value is not valid percent-encoding', { cause: error });
    }
  }
  return value;
}

/**
 * readResultsParam then decodeBatch
 */
export function decodeResults(
  input: string | null | undefined,
  param: string = RESULTS_PARAM
): ResultBatch | undefined {
  return decodeBatch(readResultsParam(input, param));
}
