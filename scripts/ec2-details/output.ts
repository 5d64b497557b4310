/**
 * Report Output
 *
 * Writes the structured report to disk, creating parent directories.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';

import { serializeReport, type ReportResult } from '../../lib/report/structured';

export function writeReport(outputPath: string, result: ReportResult): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, serializeReport(result), 'utf-8');
}
