import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_POLICY, type ValidationPolicy } from '@media-preflight/shared';
import { DEFAULT_CHUNK_SIZE, DEFAULT_FILE_TIMEOUT_MS } from '../probe/chunk-scheduler';
import { DEFAULT_MAX_METADATA_BOX_BYTES } from '../probe/parser/container-parser';
import { DEFAULT_BRIDGE_TIMINGS, type BridgeTimings } from '../bridge/types';

export const DEFAULT_SUPPORTED_EXTENSIONS: readonly string[] = Object.freeze([
  'mp4',
  'mov',
  'm4v',
]);

/**
 * Typed access to the probe, bridge, policy and report settings
 */
@Injectable()
export class ProbeConfigService {
  constructor(@Inject(ConfigService) private readonly configService: ConfigService) {}

  get chunkSizeBytes(): number {
    return this.configService.get<number>('probe.chunkSizeBytes', DEFAULT_CHUNK_SIZE);
  }

  get fileTimeoutMs(): number {
    return this.configService.get<number>('probe.fileTimeoutMs', DEFAULT_FILE_TIMEOUT_MS);
  }

  get maxMetadataBoxBytes(): number {
    return this.configService.get<number>(
      'probe.maxMetadataBoxBytes',
      DEFAULT_MAX_METADATA_BOX_BYTES
    );
  }

  get supportedExtensions(): readonly string[] {
    return this.configService.get<string[]>(
      'probe.supportedExtensions',
      [...DEFAULT_SUPPORTED_EXTENSIONS]
    );
  }

  isSupportedExtension(extension: string): boolean {
    return this.supportedExtensions.includes(extension.toLowerCase());
  }

  get bridgeTimings(): BridgeTimings {
    return {
      announceIntervalMs: this.configService.get<number>(
        'bridge.announceIntervalMs',
        DEFAULT_BRIDGE_TIMINGS.announceIntervalMs
      ),
      announceMaxAttempts: this.configService.get<number>(
        'bridge.announceMaxAttempts',
        DEFAULT_BRIDGE_TIMINGS.announceMaxAttempts
      ),
      pollIntervalMs: this.configService.get<number>(
        'bridge.pollIntervalMs',
        DEFAULT_BRIDGE_TIMINGS.pollIntervalMs
      ),
      pollMaxAttempts: this.configService.get<number>(
        'bridge.pollMaxAttempts',
        DEFAULT_BRIDGE_TIMINGS.pollMaxAttempts
      ),
      handshakeGraceMs: this.configService.get<number>(
        'bridge.handshakeGraceMs',
        DEFAULT_BRIDGE_TIMINGS.handshakeGraceMs
      ),
    };
  }

  get hostBaseUrl(): string {
    return this.configService.get<string>('host.baseUrl', 'http://localhost:8501/');
  }

  get policy(): ValidationPolicy {
    return {
      allowedFormats: this.configService.get<string[]>('policy.allowedFormats', [
        ...DEFAULT_POLICY.allowedFormats,
      ]),
      allowedVideoCodecs: this.configService.get<string[]>('policy.allowedVideoCodecs', [
        ...DEFAULT_POLICY.allowedVideoCodecs,
      ]),
      maxSizeMiB: this.configService.get<number>('policy.maxSizeMiB', DEFAULT_POLICY.maxSizeMiB),
    };
  }

  get reportOutputDir(): string {
    return this.configService.get<string>('report.outputDir', '.');
  }
}
