import path from 'path';

import { logger as defaultLogger, Logger } from '../logger';
import { findDeviceProfile } from '../devices/selector';
import { TableRow } from '../export/csv';
import { writeTable } from '../export/TableExporter';
import { RetryPolicy } from '../export/retryPolicy';
import { DeviceProfile } from '../types/DeviceProfile';
import { ExifTagSet, ImageMetadataRecord } from '../types/ImageMetadata';
import { DmsTriplet, HemisphereRef, Rational } from '../types/Rational';
import { dmsToDecimal, isHemisphereRef, reduceRational, toRational } from '../utils/coordinates';
import { assertRegularFile } from '../utils/files';
import {
  decodeComment,
  OrientationAngles,
  OrientationCommentError,
  parseOrientationComment,
} from '../utils/orientationComment';
import {
  FieldMalformedError,
  FieldMissingError,
  MetadataMissingError,
} from './errors';
import { ExifrTagReader, ExifTagReader } from './ExifTagReader';

export const DEFAULT_IMAGE_TABLE_NAME = 'metaData.csv';

export const IMAGE_TABLE_COLUMNS = [
  'datetime',
  'imgwidth',
  'imgheight',
  'focallength',
  'lat',
  'lng',
  'heading',
  'altitude',
  'yaw',
  'pitch',
  'roll',
  'senwidth',
  'senheight',
  'h_fov',
  'imgname',
] as const;

export interface ImageMetadataExtractorOptions {
  reader?: ExifTagReader;
  logger?: Logger;
  /** Checked before the built-in device table */
  deviceProfiles?: readonly DeviceProfile[];
  retryPolicy?: RetryPolicy;
  /** Directory for the batch table, defaults to the working directory */
  outputDir?: string;
  imageTableName?: string;
}

export interface ImageBatchOptions {
  writeTable?: boolean;
  /** Overrides outputDir/imageTableName for this call */
  outputPath?: string;
}

/**
 * Extracts geotag and orientation records from camera JPEGs.
 * Strict: any missing field fails the image, and a batch stops at the first failure.
 */
export class ImageMetadataExtractor {
  private readonly reader: ExifTagReader;
  private readonly logger: Logger;

  constructor(private readonly options: ImageMetadataExtractorOptions = {}) {
    this.reader = options.reader ?? new ExifrTagReader();
    this.logger = (options.logger ?? defaultLogger).child({ scope: 'image' });
  }

  /**
   * Extract the record for one image
   *
   * @param filePath - Path to the image file
   * @throws FileNotFoundError, MetadataMissingError, FieldMissingError, FieldMalformedError
   */
  async extractImage(filePath: string): Promise<ImageMetadataRecord> {
    await assertRegularFile(filePath);

    let tagSet: ExifTagSet | undefined;
    try {
      tagSet = await this.reader.read(filePath);
    } catch (error) {
      throw new MetadataMissingError(filePath, 'readable EXIF metadata', error);
    }

    if (!tagSet) {
      throw new MetadataMissingError(filePath, 'EXIF metadata');
    }
    if (!tagSet.gps || Object.keys(tagSet.gps).length === 0) {
      throw new MetadataMissingError(filePath, 'EXIF geotagging');
    }

    const record = buildImageRecord(filePath, tagSet.tags, tagSet.gps, this.options.deviceProfiles);
    this.logger.debug({ file: filePath }, 'Extracted image metadata.');
    return record;
  }

  /**
   * Extract records for several images, in input order.
   * Nothing is exported unless every image succeeds.
   */
  async extractImageBatch(
    filePaths: readonly string[],
    options: ImageBatchOptions = {}
  ): Promise<ImageMetadataRecord[]> {
    this.logger.info({ images: filePaths.length }, 'Reading EXIF data.');

    const records: ImageMetadataRecord[] = [];
    for (const filePath of filePaths) {
      const record = await this.extractImage(filePath);
      records.push({ ...record, imageName: path.basename(filePath) });
    }

    if (options.writeTable) {
      const targetPath = options.outputPath ?? this.defaultTablePath();
      this.logger.info({ file: targetPath }, 'Saving to csv.');
      await writeTable(IMAGE_TABLE_COLUMNS, records.map(imageRecordToRow), targetPath, {
        retryPolicy: this.options.retryPolicy,
        logger: this.logger,
      });
    }

    this.logger.info({ images: records.length }, 'Done.');
    return records;
  }

  private defaultTablePath(): string {
    return path.resolve(
      this.options.outputDir ?? process.cwd(),
      this.options.imageTableName ?? DEFAULT_IMAGE_TABLE_NAME
    );
  }
}

export function imageRecordToRow(record: ImageMetadataRecord): TableRow {
  return {
    datetime: record.captureTime,
    imgwidth: record.frameWidth,
    imgheight: record.frameHeight,
    focallength: record.focalLengthMm,
    lat: record.latitude,
    lng: record.longitude,
    heading: record.headingDeg,
    altitude: record.altitudeM,
    yaw: record.yawDeg,
    pitch: record.pitchDeg,
    roll: record.rollDeg,
    senwidth: record.sensorWidthMm,
    senheight: record.sensorHeightMm,
    h_fov: record.horizontalFovDeg,
    imgname: record.imageName,
  };
}

/**
 * Assemble a record from decoded tag dictionaries
 */
export function buildImageRecord(
  filePath: string,
  tags: Record<string, unknown>,
  gps: Record<string, unknown>,
  deviceProfiles: readonly DeviceProfile[] = []
): ImageMetadataRecord {
  const fields = new TagFields(filePath);

  const captureTime = fields.string(tags, 'DateTimeOriginal');
  const frameWidth = fields.dimension(tags, 'ImageWidth', 'ExifImageWidth');
  const frameHeight = fields.dimension(tags, 'ImageHeight', 'ExifImageHeight');
  const focalLengthMm = reduceRational(fields.rational(tags, 'FocalLength'));
  const latitude = dmsToDecimal(fields.dms(gps, 'GPSLatitude'), fields.ref(gps, 'GPSLatitudeRef'));
  const longitude = dmsToDecimal(
    fields.dms(gps, 'GPSLongitude'),
    fields.ref(gps, 'GPSLongitudeRef')
  );
  const headingDeg = reduceRational(fields.rational(gps, 'GPSImgDirection'));
  const altitude = reduceRational(fields.rational(gps, 'GPSAltitude'));
  const belowSeaLevel = fields.optionalByte(gps, 'GPSAltitudeRef') === 1;
  const orientation = readOrientation(filePath, fields.require(tags, 'UserComment'));

  const record: ImageMetadataRecord = {
    captureTime,
    frameWidth,
    frameHeight,
    focalLengthMm,
    latitude,
    longitude,
    headingDeg,
    altitudeM: belowSeaLevel ? -altitude : altitude,
    ...orientation,
  };

  const make = tags.Make;
  const model = tags.Model;
  const profile = findDeviceProfile(
    typeof make === 'string' ? make : undefined,
    typeof model === 'string' ? model : undefined,
    deviceProfiles
  );
  if (profile) {
    record.sensorWidthMm = profile.sensorWidthMm;
    record.sensorHeightMm = profile.sensorHeightMm;
    record.horizontalFovDeg = profile.horizontalFovDeg;
  }

  return record;
}

function readOrientation(filePath: string, value: unknown): OrientationAngles {
  const comment = decodeComment(value);
  if (comment === undefined) {
    throw new FieldMalformedError(filePath, 'UserComment', 'expected text or bytes');
  }
  try {
    return parseOrientationComment(comment);
  } catch (error) {
    if (error instanceof OrientationCommentError) {
      throw new FieldMalformedError(filePath, 'UserComment', error.message);
    }
    throw error;
  }
}

/**
 * Typed access to raw tag values, failing with the tag name
 */
class TagFields {
  constructor(private readonly filePath: string) {}

  require(source: Record<string, unknown>, field: string): unknown {
    const value = source[field];
    if (value === undefined || value === null) {
      throw new FieldMissingError(this.filePath, field);
    }
    return value;
  }

  string(source: Record<string, unknown>, field: string): string {
    const value = this.require(source, field);
    if (typeof value !== 'string') {
      throw new FieldMalformedError(this.filePath, field, 'expected text');
    }
    return value;
  }

  dimension(source: Record<string, unknown>, field: string, fallback: string): number {
    const key = source[field] === undefined || source[field] === null ? fallback : field;
    if (source[key] === undefined || source[key] === null) {
      throw new FieldMissingError(this.filePath, field);
    }
    const value = reduceRational(this.rational(source, key));
    if (!Number.isInteger(value) || value <= 0) {
      throw new FieldMalformedError(this.filePath, key, `expected a positive integer, got ${value}`);
    }
    return value;
  }

  rational(source: Record<string, unknown>, field: string): Rational {
    const rational = asRational(this.require(source, field));
    if (!rational) {
      throw new FieldMalformedError(this.filePath, field, 'expected a number or rational');
    }
    return rational;
  }

  dms(source: Record<string, unknown>, field: string): DmsTriplet {
    const value = this.require(source, field);
    if (!isList(value) || value.length !== 3) {
      throw new FieldMalformedError(this.filePath, field, 'expected degrees, minutes and seconds');
    }
    const [degrees, minutes, seconds] = [value[0], value[1], value[2]].map(asRational);
    if (!degrees || !minutes || !seconds) {
      throw new FieldMalformedError(this.filePath, field, 'expected rational components');
    }
    return [degrees, minutes, seconds];
  }

  ref(source: Record<string, unknown>, field: string): HemisphereRef {
    const value = this.require(source, field);
    const letter = typeof value === 'string' ? value.trim().toUpperCase() : value;
    if (!isHemisphereRef(letter)) {
      throw new FieldMalformedError(this.filePath, field, `unknown reference ${String(value)}`);
    }
    return letter;
  }

  optionalByte(source: Record<string, unknown>, field: string): number | undefined {
    const value = source[field];
    if (typeof value === 'number') {
      return value;
    }
    if (isList(value) && typeof value[0] === 'number') {
      return value[0];
    }
    return undefined;
  }
}

function isList(value: unknown): value is ArrayLike<unknown> {
  return Array.isArray(value) || value instanceof Uint8Array;
}

/**
 * exifr yields divided numbers; hand-built tag sets may carry [num, den] pairs
 */
function asRational(value: unknown): Rational | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return toRational(value);
  }
  if (Array.isArray(value) && value.length === 2) {
    const [numerator, denominator] = value;
    if (typeof numerator === 'number' && typeof denominator === 'number') {
      return [numerator, denominator];
    }
  }
  return undefined;
}

/**
 * Extract one image with default collaborators (exifr, built-in devices)
 */
export function extractImage(
  filePath: string,
  options?: ImageMetadataExtractorOptions
): Promise<ImageMetadataRecord> {
  return new ImageMetadataExtractor(options).extractImage(filePath);
}

export function extractImageBatch(
  filePaths: readonly string[],
  writeTableFlag: boolean,
  options?: ImageMetadataExtractorOptions
): Promise<ImageMetadataRecord[]> {
  return new ImageMetadataExtractor(options).extractImageBatch(filePaths, {
    writeTable: writeTableFlag,
  });
}
