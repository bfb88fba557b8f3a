import { Inject, Injectable, Logger } from '@nestjs/common';
import * as path from 'path';
import {
  ProbeError,
  classify,
  classifyInapplicable,
  errorRecord,
  fileExtension,
  formatMiB,
  type FileRecord,
  type ProbeTimeline,
  type ValidationPolicy,
} from '@media-preflight/shared';
import { ProbeConfigService } from '../config/probe.config';
import { ChunkScheduler } from './chunk-scheduler';
import type { ByteSource } from './sources/byte-source';
import { FileByteSource } from './sources/file-byte-source';

/** A file path on disk or an already opened byte source */
export type ProbeInput = string | ByteSource;

export interface ProbeRunOptions {
  timeline?: ProbeTimeline;
  /** Overrides the configured policy for this run */
  policy?: ValidationPolicy;
}

/**
 * Probes files one at a time and classifies them against the policy.
 * Every input yields exactly one FileRecord, in input order.
 */
@Injectable()
export class ProbeService {
  private readonly logger = new Logger(ProbeService.name);

  constructor(@Inject(ProbeConfigService) private readonly config: ProbeConfigService) {}

  async runBatch(inputs: readonly ProbeInput[], options: ProbeRunOptions = {}): Promise<FileRecord[]> {
    const { timeline } = options;
    const records: FileRecord[] = [];

    timeline?.append(`Selected ${inputs.length} file(s). Starting analysis...`);
    this.logger.log(`Probing ${inputs.length} file(s)`);

    for (const [index, input] of inputs.entries()) {
      timeline?.append(`Processing file ${index + 1}: ${inputName(input)}`);
      records.push(await this.probe(input, options));
    }

    timeline?.append(`Analysis complete. Preparing ${records.length} result(s) for return.`);
    return records;
  }

  /**
   * Probe one input. Never throws: failures become error records.
   */
  async probe(input: ProbeInput, options: ProbeRunOptions = {}): Promise<FileRecord> {
    const policy = options.policy ?? this.config.policy;

    let source: ByteSource;
    try {
      source = typeof input === 'string' ? await FileByteSource.open(input) : input;
    } catch (error) {
      const failure = ProbeError.fromError(error);
      this.logger.warn(`Could not open ${inputName(input)}: ${failure.message}`);
      options.timeline?.append(`Error on ${inputName(input)}: ${failure.message}`);
      return errorRecord(inputName(input), 0, failure.message, policy);
    }

    try {
      return await this.probeSource(source, options, policy);
    } finally {
      await this.closeSource(source);
    }
  }

  private async probeSource(
    source: ByteSource,
    options: ProbeRunOptions,
    policy: ValidationPolicy
  ): Promise<FileRecord> {
    const { timeline } = options;
    const extension = fileExtension(source.name);

    if (!this.config.isSupportedExtension(extension)) {
      timeline?.append(
        `Skipping ${source.name} (extension ${extension || 'none'}) - not a supported container.`
      );
      return classifyInapplicable(source.name, source.size, extension, policy);
    }

    timeline?.append(
      `Chunked parser reading ${formatMiB(source.size, 1)} in ${formatMiB(this.config.chunkSizeBytes, 1)} chunks.`
    );

    const scheduler = new ChunkScheduler(source, {
      chunkSize: this.config.chunkSizeBytes,
      timeoutMs: this.config.fileTimeoutMs,
      maxMetadataBoxBytes: this.config.maxMetadataBoxBytes,
      timeline,
    });

    try {
      const info = await scheduler.run();
      const record = classify(
        {
          name: source.name,
          byteSize: source.size,
          // Without ftyp the extension is the best hint at the container family
          rawBrand: info.brand ?? extension,
          rawVideoCodec: info.videoCodec,
          rawAudioCodec: info.audioCodec,
        },
        policy
      );
      timeline?.append(
        `Parsed ${source.name} -> format: ${record.containerFormat}, video: ${record.videoCodec}, audio: ${record.audioCodec}`
      );
      return record;
    } catch (error) {
      const failure = ProbeError.fromError(error);
      this.logger.warn(`Probe failed for ${source.name} [${failure.code}]: ${failure.message}`);
      timeline?.append(`Error on ${source.name}: ${failure.message}`);
      return errorRecord(source.name, source.size, failure.message, policy);
    }
  }

  private async closeSource(source: ByteSource): Promise<void> {
    try {
      await source.close?.();
    } catch (error) {
      this.logger.warn(
        `Failed to close ${source.name}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

function inputName(input: ProbeInput): string {
  return typeof input === 'string' ? path.basename(input) : input.name;
}
