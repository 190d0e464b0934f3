import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import * as XLSX from 'xlsx';
import type { PhotoRecord, UniqueLocation } from '@/shared/types/common.types';
import { logger } from '@/shared/utils/logger';

type CsvRow = Record<string, string>;

export const PHOTO_REPORT_COLUMNS = [
    'file_path',
    'latitude',
    'longitude',
    'city',
    'state',
    'country',
    'display_name',
] as const;

export const UNIQUE_LOCATIONS_COLUMNS = ['city', 'state', 'country'] as const;

/**
 * Render rows as CSV with a fixed header; absent values become empty cells
 */
export function toCsv(rows: CsvRow[], columns: readonly string[]): string {
    const worksheet = XLSX.utils.json_to_sheet(rows, { header: [...columns] });
    return XLSX.utils.sheet_to_csv(worksheet);
}

async function writeCsv(filePath: string, csv: string, rowCount: number): Promise<void> {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, csv, 'utf-8');

    logger.info({
        event: 'report.written',
        filePath,
        rows: rowCount,
    }, `Report saved to ${filePath}`);
}

/**
 * Map photo records to the rows of the per-photo report
 */
export function photoReportRows(records: PhotoRecord[]): CsvRow[] {
    return records.map((record) => ({
        file_path: record.path,
        // Stored as text so the full precision survives General number formatting
        latitude: record.coordinate ? String(record.coordinate.latitude) : '',
        longitude: record.coordinate ? String(record.coordinate.longitude) : '',
        city: record.location?.city ?? '',
        state: record.location?.state ?? '',
        country: record.location?.country ?? '',
        display_name: record.location?.displayName ?? '',
    }));
}

/**
 * Write one row per photo with its coordinate and resolved location
 */
export async function writePhotoReport(filePath: string, records: PhotoRecord[]): Promise<void> {
    const csv = toCsv(photoReportRows(records), PHOTO_REPORT_COLUMNS);
    await writeCsv(filePath, csv, records.length);
}

/**
 * Write the deduplicated list of visited places
 */
export async function writeUniqueLocationsReport(filePath: string, locations: UniqueLocation[]): Promise<void> {
    const rows = locations.map((location) => ({
        city: location.city,
        state: location.state ?? '',
        country: location.country ?? '',
    }));
    const csv = toCsv(rows, UNIQUE_LOCATIONS_COLUMNS);
    await writeCsv(filePath, csv, locations.length);
}
