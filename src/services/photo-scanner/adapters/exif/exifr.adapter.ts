import exifr from 'exifr';
import type { ExifReader } from './exif.interface';
import type { GpsTags } from '@/shared/types/common.types';

const GPS_TAGS = ['GPSLatitude', 'GPSLatitudeRef', 'GPSLongitude', 'GPSLongitudeRef'];

function isTagMap(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * exifr Reader
 *
 * Keeps the raw sexagesimal tuples and hemisphere references so the
 * conversion to signed decimal degrees happens in one place.
 */
export class ExifrReader implements ExifReader {
    async readGpsTags(filePath: string): Promise<GpsTags | null> {
        const output: unknown = await exifr.parse(filePath, {
            pick: GPS_TAGS,
            // Keep 'N'/'S'/'E'/'W' references and [d, m, s] tuples as stored
            translateValues: false,
        });

        if (!isTagMap(output)) return null;

        const tags: Record<string, unknown> = {};
        for (const tag of GPS_TAGS) {
            if (output[tag] !== undefined) tags[tag] = output[tag];
        }
        return Object.keys(tags).length > 0 ? tags : null;
    }
}
