const list = (value: string | undefined, fallback: string[]): string[] =>
  value
    ?.split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0) ?? fallback;

const configuration = () => ({
  probe: {
    chunkSizeBytes: parseInt(process.env.PROBE_CHUNK_SIZE_BYTES || '4194304', 10),
    fileTimeoutMs: parseInt(process.env.PROBE_FILE_TIMEOUT_MS || '45000', 10),
    maxMetadataBoxBytes: parseInt(
      process.env.PROBE_MAX_METADATA_BOX_BYTES || '67108864',
      10
    ),
    supportedExtensions: list(process.env.PROBE_SUPPORTED_EXTENSIONS, [
      'mp4',
      'mov',
      'm4v',
    ]),
  },

  bridge: {
    announceIntervalMs: parseInt(process.env.BRIDGE_ANNOUNCE_INTERVAL_MS || '1500', 10),
    announceMaxAttempts: parseInt(process.env.BRIDGE_ANNOUNCE_MAX_ATTEMPTS || '10', 10),
    pollIntervalMs: parseInt(process.env.BRIDGE_POLL_INTERVAL_MS || '250', 10),
    pollMaxAttempts: parseInt(process.env.BRIDGE_POLL_MAX_ATTEMPTS || '40', 10),
    handshakeGraceMs: parseInt(process.env.BRIDGE_HANDSHAKE_GRACE_MS || '2000', 10),
  },

  host: {
    baseUrl: process.env.HOST_BASE_URL || 'http://localhost:8501/',
  },

  policy: {
    allowedFormats: list(process.env.POLICY_ALLOWED_FORMATS, ['mp4', 'mov']),
    allowedVideoCodecs: list(process.env.POLICY_ALLOWED_VIDEO_CODECS, [
      'h264',
      'avc',
      'hevc',
      'h265',
      'mpeg1video',
      'mpeg2video',
      'mpeg1',
      'mpeg2',
    ]),
    maxSizeMiB: parseFloat(process.env.POLICY_MAX_SIZE_MIB || '200'),
  },

  report: {
    outputDir: process.env.REPORT_OUTPUT_DIR || '.',
  },
});

export type AppConfiguration = ReturnType<typeof configuration>;

export default configuration;
