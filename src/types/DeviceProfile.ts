/**
 * Fixed sensor geometry for a known phone model
 */
export interface DeviceProfile {
  make: string; // Lower-case manufacturer as written in EXIF Make
  model: string; // Lower-case model as written in EXIF Model
  sensorWidthMm: number;
  sensorHeightMm: number;
  horizontalFovDeg: number; // Portrait mode
}
