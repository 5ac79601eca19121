/**
 * Geotag record for one numbered block of a video subtitle log
 */
export interface VideoLogRecord {
  captureTime: string;
  latitude: number;
  longitude: number;
  headingDeg: number;
  altitudeM: number;
  frameStart: number; // Seconds from the start of the video
  frameEnd: number; // Seconds from the start of the video
}
