/**
 * Geotag record extracted from one image
 */
export interface ImageMetadataRecord {
  captureTime: string; // DateTimeOriginal as stored by the camera
  frameWidth: number; // Pixels
  frameHeight: number; // Pixels
  focalLengthMm: number;
  latitude: number; // Decimal degrees, negative = South
  longitude: number; // Decimal degrees, negative = West
  headingDeg: number; // Compass heading from the magnetometer
  altitudeM: number; // Meters above sea level
  yawDeg: number;
  pitchDeg: number;
  rollDeg: number;
  // Only set when the device has a known profile
  sensorWidthMm?: number;
  sensorHeightMm?: number;
  horizontalFovDeg?: number;
  // Only set in batch mode
  imageName?: string;
}

/**
 * Decoded EXIF tag dictionary with its GPS sub-dictionary
 */
export interface ExifTagSet {
  tags: Record<string, unknown>; // IFD0 and EXIF IFD, keyed by tag name
  gps?: Record<string, unknown>; // GPSInfo IFD, keyed by tag name
}
