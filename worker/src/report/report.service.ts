import { Inject, Injectable, Logger } from '@nestjs/common';
import { Workbook, type Border, type Cell, type Fill, type Font } from 'exceljs';
import JSZip from 'jszip';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  FLAG_COLUMNS,
  Flag,
  REPORT_SHEET_NAME,
  buildReportTable,
  reportFileName,
  type FileRecord,
  type ReportTable,
} from '@media-preflight/shared';
import { ProbeConfigService } from '../config/probe.config';

// Document properties and zip entry dates are pinned so the same batch always
// produces the same bytes
export const REPORT_DOCUMENT_DATE = new Date('2000-01-01T00:00:00.000Z');
export const REPORT_CREATOR = 'media-preflight';

export const COLUMN_WIDTHS: readonly number[] = [50, 15, 18, 35, 18, 15, 15];

const THIN_BORDER: Partial<Border> = { style: 'thin', color: { argb: 'FF000000' } };
const CELL_BORDER = {
  top: THIN_BORDER,
  left: THIN_BORDER,
  bottom: THIN_BORDER,
  right: THIN_BORDER,
};

const solid = (argb: string): Fill => ({
  type: 'pattern',
  pattern: 'solid',
  fgColor: { argb },
});

const HEADER_FILL = solid('FF4472C4');
const HEADER_FONT: Partial<Font> = { bold: true, color: { argb: 'FFFFFFFF' } };

const FLAG_STYLES: Record<Flag, { fill: Fill; font: Partial<Font> }> = {
  [Flag.PASS]: { fill: solid('FFC6EFCE'), font: { color: { argb: 'FF006100' } } },
  [Flag.FAIL]: { fill: solid('FFFFC7CE'), font: { color: { argb: 'FF9C0006' } } },
};

function isFlag(value: unknown): value is Flag {
  return value === Flag.PASS || value === Flag.FAIL;
}

export interface WriteReportOptions {
  outputDir?: string;
  /** Only used for the file name */
  generatedAt?: Date;
}

/**
 * Spreadsheet export of a result batch
 */
@Injectable()
export class ReportService {
  private readonly logger = new Logger(ReportService.name);

  constructor(@Inject(ProbeConfigService) private readonly config: ProbeConfigService) {}

  buildWorkbook(records: readonly FileRecord[]): Workbook {
    const table = buildReportTable(records);
    const workbook = new Workbook();
    workbook.creator = REPORT_CREATOR;
    workbook.lastModifiedBy = REPORT_CREATOR;
    workbook.created = REPORT_DOCUMENT_DATE;
    workbook.modified = REPORT_DOCUMENT_DATE;

    const sheet = workbook.addWorksheet(REPORT_SHEET_NAME, {
      views: [{ state: 'frozen', xSplit: 0, ySplit: 1 }],
    });
    sheet.columns = COLUMN_WIDTHS.map((width) => ({ width }));

    const header = sheet.addRow([...table.header]);
    header.eachCell((cell) => {
      cell.font = HEADER_FONT;
      cell.fill = HEADER_FILL;
      cell.border = CELL_BORDER;
      cell.alignment = { vertical: 'middle', horizontal: 'center' };
    });

    for (const row of table.rows) {
      const added = sheet.addRow([...row]);
      added.eachCell((cell, columnNumber) => {
        cell.border = CELL_BORDER;
        if (FLAG_COLUMNS.includes(columnNumber - 1)) {
          this.styleFlagCell(cell);
        }
      });
    }

    sheet.autoFilter = {
      from: { row: 1, column: 1 },
      to: { row: table.rows.length + 1, column: table.header.length },
    };

    return workbook;
  }

  async toBuffer(records: readonly FileRecord[]): Promise<Buffer> {
    const workbook = this.buildWorkbook(records);
    return normalizeArchive(Buffer.from(await workbook.xlsx.writeBuffer()));
  }

  /**
   * Write the workbook under the output directory
   *
   * @returns path of the written file
   */
  async writeReport(
    records: readonly FileRecord[],
    options: WriteReportOptions = {}
  ): Promise<string> {
    const outputDir = options.outputDir ?? this.config.reportOutputDir;
    const filePath = path.join(outputDir, reportFileName(options.generatedAt ?? new Date()));

    await fs.mkdir(outputDir, { recursive: true });
    await fs.writeFile(filePath, await this.toBuffer(records));

    this.logger.log(`Wrote ${records.length} row(s) to ${filePath}`);
    return filePath;
  }

  /**
   * Plain-text preview of the report table
   */
  renderText(records: readonly FileRecord[]): string {
    return formatTable(buildReportTable(records));
  }

  private styleFlagCell(cell: Cell): void {
    const value = cell.value;
    if (!isFlag(value)) {
      return;
    }
    const style = FLAG_STYLES[value];
    cell.fill = style.fill;
    cell.font = style.font;
    cell.alignment = { horizontal: 'center' };
  }
}

/**
 * Repack the xlsx archive with every entry dated REPORT_DOCUMENT_DATE.
 * The zip writer stamps entries with the current time otherwise.
 */
export async function normalizeArchive(archive: Buffer): Promise<Buffer> {
  const source = await JSZip.loadAsync(archive);
  const target = new JSZip();

  for (const entry of Object.values(source.files)) {
    if (entry.dir) {
      continue;
    }
    // Implicit folder entries would be dated with the clock
    target.file(entry.name, await entry.async('uint8array'), {
      date: REPORT_DOCUMENT_DATE,
      createFolders: false,
    });
  }

  return target.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  });
}

function formatTable(table: ReportTable): string {
  const lines: string[][] = [[...table.header], ...table.rows.map((row) => [...row])];
  const widths = table.header.map((_, column) =>
    Math.max(...lines.map((line) => line[column].length))
  );
  const render = (line: string[]) =>
    line
      .map((value, column) => value.padEnd(widths[column]))
      .join(' | ')
      .trimEnd();

  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
  return [render(lines[0]), separator, ...lines.slice(1).map(render)].join('\n');
}
