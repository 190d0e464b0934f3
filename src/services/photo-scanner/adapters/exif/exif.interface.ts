import type { GpsTags } from '@/shared/types/common.types';

/**
 * EXIF Reader Interface
 *
 * Reads the raw GPS tags of an image file
 *
 * Implementations: exifr
 */
export interface ExifReader {
    /**
     * Read GPSLatitude / GPSLatitudeRef / GPSLongitude / GPSLongitudeRef
     *
     * @returns Raw tag map, or null when the file carries no GPS block
     * @throws If the file cannot be read or decoded
     */
    readGpsTags(filePath: string): Promise<GpsTags | null>;
}
