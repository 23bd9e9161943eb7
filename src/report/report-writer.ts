import fs from 'fs/promises';
import path from 'path';
import { constants, type Stats } from 'fs';
import { ScanSetupError } from '../errors.js';
import type { Report } from '../types/report.js';

/** Fails fast when the report could not be written once the scan is over. */
export async function assertWritable(outputPath: string): Promise<void> {
  const directory = path.dirname(path.resolve(outputPath));

  try {
    const stats = await fs.stat(directory);
    if (!stats.isDirectory()) {
      throw new Error(`${directory} is not a directory`);
    }
    await fs.access(directory, constants.W_OK);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new ScanSetupError('OUTPUT_UNWRITABLE', `Cannot write report to ${outputPath}: ${errorMessage}`, { cause: error });
  }

  let existing: Stats | null = null;
  try {
    existing = await fs.stat(outputPath);
  } catch (error) {
    // A missing report file is created on write
    if (!isMissingFile(error)) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new ScanSetupError('OUTPUT_UNWRITABLE', `Cannot write report to ${outputPath}: ${errorMessage}`, { cause: error });
    }
  }

  if (existing?.isDirectory()) {
    throw new ScanSetupError('OUTPUT_UNWRITABLE', `Cannot write report to ${outputPath}: path is a directory`);
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/** Write the whole report to a sibling temp file, then rename it over the target. */
export async function writeReport(outputPath: string, report: Report): Promise<void> {
  const tempPath = `${outputPath}.${process.pid}.${Date.now()}.tmp`;
  const json = `${JSON.stringify(report, null, 2)}\n`;

  try {
    await fs.writeFile(tempPath, json, 'utf8');
    await fs.rename(tempPath, outputPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
