import * as exifr from 'exifr';
import { ExifTagSet } from '../types/ImageMetadata';

/**
 * Decodes the EXIF tag dictionary of an image
 */
export interface ExifTagReader {
  /**
   * @param filePath - Absolute path to the image file
   * @returns Tag dictionary, or undefined when the image carries no EXIF
   */
  read(filePath: string): Promise<ExifTagSet | undefined>;
}

/**
 * exifr-backed reader. Output is kept per IFD so the GPS block stays a
 * separate sub-dictionary, and values are left raw (no date revival, no
 * value translation) so strings come back exactly as the camera wrote them.
 */
export class ExifrTagReader implements ExifTagReader {
  async read(filePath: string): Promise<ExifTagSet | undefined> {
    const output: unknown = await exifr.parse(filePath, {
      exif: true,
      gps: true,
      userComment: true,
      xmp: false,
      icc: false,
      iptc: false,
      jfif: false,
      mergeOutput: false,
      translateKeys: true,
      translateValues: false,
      reviveValues: false,
    });

    if (!isRecord(output)) {
      return undefined;
    }

    const ifd0 = isRecord(output.ifd0) ? output.ifd0 : {};
    const exif = isRecord(output.exif) ? output.exif : {};
    const tags: Record<string, unknown> = { ...ifd0, ...exif };
    // exifr reports the comment beside the IFD blocks, not inside `exif`
    if (output.userComment !== undefined && output.userComment !== null) {
      tags.UserComment = output.userComment;
    }
    if (Object.keys(tags).length === 0) {
      return undefined;
    }

    return {
      tags,
      gps: isRecord(output.gps) ? output.gps : undefined,
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !ArrayBuffer.isView(value)
  );
}
