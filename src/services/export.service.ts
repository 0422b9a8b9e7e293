import fs from 'fs/promises';
import path from 'path';
import { createObjectCsvStringifier } from 'csv-writer';
import { ClassificationRecord } from '../types/audit.types';
import { logger } from '../utils/logger';

export const REPORT_COLUMNS = [
  { id: 'UserId', title: 'UserId' },
  { id: 'RoleName', title: 'RoleName' },
  { id: 'RequestType', title: 'RequestType' }
];

type ReportCsvRow = {
  UserId: string;
  RoleName: string;
  RequestType: string;
};

export class ExportService {
  private readonly logger = logger.child({ service: 'ExportService' });

  toCsv(rows: ClassificationRecord[]): string {
    const csvStringifier = createObjectCsvStringifier({
      header: REPORT_COLUMNS
    });

    const records: ReportCsvRow[] = rows.map(row => ({
      UserId: row.identity,
      RoleName: row.roleName,
      RequestType: row.disposition
    }));

    return (csvStringifier.getHeaderString() ?? '') + csvStringifier.stringifyRecords(records);
  }

  /**
   * Write the removal report. Nothing is written for an empty report.
   * Returns the absolute path written, or null.
   */
  async writeReport(rows: ClassificationRecord[], filePath: string): Promise<string | null> {
    if (rows.length === 0) {
      return null;
    }

    const absolutePath = path.resolve(filePath);
    await fs.writeFile(absolutePath, this.toCsv(rows), 'utf-8');
    this.logger.info(`Wrote ${rows.length} report row(s) to ${absolutePath}`);
    return absolutePath;
  }
}
