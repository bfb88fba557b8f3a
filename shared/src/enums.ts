// Shared enums for the project

export enum Flag {
  PASS = 'pass',
  FAIL = 'fail',
}

export enum ParseStatus {
  READING = 'reading',
  READY = 'ready',
  FAILED = 'failed',
  TIMED_OUT = 'timed-out',
}

export enum ChannelKind {
  DIRECT = 'direct',
  FALLBACK_REDIRECT = 'fallback-redirect',
  UNDISCOVERED = 'undiscovered',
}

/**
 * How the sandbox reaches its host once a channel is known.
 * DIRECT_OBJECT: a host object is callable through the embedding relationship.
 * MESSAGE_ONLY: only messages can cross the boundary.
 */
export enum HostCapability {
  DIRECT_OBJECT = 'direct-object',
  MESSAGE_ONLY = 'message-only',
}

export enum BridgeState {
  UNCONNECTED = 'unconnected',
  ANNOUNCING = 'announcing',
  CONNECTED = 'connected',
  DEGRADED_POLLING = 'degraded-polling',
  DELIVERING = 'delivering',
  DONE = 'done',
}

export enum DeliveryChannel {
  DIRECT_CALL = 'direct-call',
  SCOPED_MESSAGE = 'scoped-message',
  REDIRECT = 'redirect',
}

export enum ProbeErrorCode {
  READ_ERROR = 'READ_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  TIMEOUT = 'TIMEOUT',
  CHANNEL_ERROR = 'CHANNEL_ERROR',
  DECODE_ERROR = 'DECODE_ERROR',
  UNKNOWN = 'UNKNOWN',
}

// Canonical tags used by the validation policy
export const CANONICAL_FORMATS = {
  MP4: 'mp4',
  MOV: 'mov',
} as const;

export const CANONICAL_CODECS = {
  H264: 'h264',
  HEVC: 'hevc',
  AAC: 'aac',
} as const;

