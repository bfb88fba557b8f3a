/**
 * Row-oriented report of a result batch
 *
 * The same table feeds the console preview and the spreadsheet export, so
 * both show identical values.
 */

import type { FileRecord } from '../schema/file-record';
import { formatMiB } from '../utils/file-size';

export const REPORT_HEADER = [
  'File Name',
  'Video Format',
  'Video Format Flag',
  'Video Codecs',
  'Video Codecs Flag',
  'File Size',
  'File Size Flag',
] as const;

// Column indexes holding pass/fail values
export const FLAG_COLUMNS: readonly number[] = [2, 4, 6];

export const REPORT_SHEET_NAME = 'Video Metadata';

export const REPORT_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export type ReportRow = [
  fileName: string,
  format: string,
  formatFlag: string,
  codecs: string,
  codecFlag: string,
  size: string,
  sizeFlag: string,
];

export interface ReportTable {
  header: readonly string[];
  rows: ReportRow[];
}

export function toReportRow(record: FileRecord): ReportRow {
  return [
    record.name,
    record.containerFormat,
    record.formatFlag,
    `Video: ${record.videoCodec}, Audio: ${record.audioCodec}`,
    record.codecFlag,
    formatMiB(record.byteSize),
    record.sizeFlag,
  ];
}

/**
 * One header row plus one row per record, in batch order
 */
export function buildReportTable(records: readonly FileRecord[]): ReportTable {
  return {
    header: [...REPORT_HEADER],
    rows: records.map(toReportRow),
  };
}

/**
 * Suggested download name. The timestamp is the only part of the export that
 * depends on when it was generated.
 *
 * @example
 * reportFileName(new Date('2024-05-01T10:20:30.456Z'))
 * // 'video_metadata_2024-05-01T10-20-30.xlsx'
 */
export function reportFileName(generatedAt: Date): string {
  const timestamp = generatedAt.toISOString().replace(/[:.]/g, '-').slice(0, 19);
  return `video_metadata_${timestamp}.xlsx`;
}
