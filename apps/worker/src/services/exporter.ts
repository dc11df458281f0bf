import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ListingRecord } from '../scrapers/types';
import { encodeResultSet } from './result-codec';

export type ExportedFile = {
  filename: string;
  path: string;
  csv: string;
};

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** car_listings_YYYY-MM-DD_HH-mm-ss.csv, in UTC */
export function buildExportFilename(timestamp: Date): string {
  const date = `${timestamp.getUTCFullYear()}-${pad(timestamp.getUTCMonth() + 1)}-${pad(timestamp.getUTCDate())}`;
  const time = `${pad(timestamp.getUTCHours())}-${pad(timestamp.getUTCMinutes())}-${pad(timestamp.getUTCSeconds())}`;
  return `car_listings_${date}_${time}.csv`;
}

export async function exportResultSet(
  records: ListingRecord[],
  options: { directory: string; timestamp: Date },
): Promise<ExportedFile> {
  const csv = encodeResultSet(records);
  const filename = buildExportFilename(options.timestamp);
  const path = join(options.directory, filename);

  await mkdir(options.directory, { recursive: true });
  await writeFile(path, csv, 'utf8');
  console.log(`[Exporter] Wrote ${records.length} listings to ${path}`);

  return { filename, path, csv };
}
