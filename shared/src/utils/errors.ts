import { ProbeErrorCode } from '../enums';

/**
 * Base error for everything the probe and bridge can fail with.
 * `code` identifies the failure class; `message` is what ends up in
 * error records and the timeline.
 */
export class ProbeError extends Error {
  readonly code: ProbeErrorCode;

  constructor(code: ProbeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProbeError';
    this.code = code;
  }

  /**
   * Wrap any thrown value, keeping ProbeErrors as they are
   */
  static fromError(error: unknown): ProbeError {
    if (error instanceof ProbeError) {
      return error;
    }
    if (error instanceof Error) {
      return new ProbeError(ProbeErrorCode.UNKNOWN, error.message, { cause: error });
    }
    return new ProbeError(ProbeErrorCode.UNKNOWN, String(error));
  }
}

/** A chunk could not be read from the byte source */
export class ReadError extends ProbeError {
  constructor(detail?: string, options?: { cause?: unknown }) {
    super(
      ProbeErrorCode.READ_ERROR,
      detail ? `File read error: ${detail}` : 'File read error',
      options
    );
    this.name = 'ReadError';
  }
}

/** The container scanner rejected the input */
export class ParseError extends ProbeError {
  constructor(reason: string) {
    super(ProbeErrorCode.PARSE_ERROR, `Container parse error: ${reason}`);
    this.name = 'ParseError';
  }
}

export class TimeoutError extends ProbeError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(ProbeErrorCode.TIMEOUT, 'Processing timeout');
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** A single delivery attempt failed; the bridge falls through to the next channel */
export class ChannelError extends ProbeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ProbeErrorCode.CHANNEL_ERROR, message, options);
    this.name = 'ChannelError';
  }
}

/** An inbound fallback payload could not be decoded */
export class DecodeError extends ProbeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ProbeErrorCode.DECODE_ERROR, `Error decoding results: ${message}`, options);
    this.name = 'DecodeError';
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
