import { VideoLogRecord } from '../types/VideoLogMetadata';
import { dmsToDecimal, roundTo, toRational } from '../utils/coordinates';

/**
 * Parser for the subtitle-style log the camera app writes next to a video.
 *
 * Each block looks like:
 *
 *   1
 *   00:00:00,000 --> 00:00:01,000
 *   2021-03-14 09:26:53
 *   12°58'34"N, 77°35'40"E, 271.5, 920.3
 *
 * The coordinate line is split on every single `°`, `'`, `"`, `,` and space,
 * so separators leave fixed empty tokens between the values.
 */

const TIMING_SEPARATOR = '-->';
const TIMESTAMP_PATTERN = /^(\d{1,2}):(\d{2}):(\d{2}),(\d{1,6})$/;
const COORDINATE_DELIMITERS = /[°'", ]/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

const LAT_TOKENS = [0, 1, 2] as const;
const LAT_REF_TOKEN = 3;
const LNG_TOKENS = [5, 6, 7] as const;
const LNG_REF_TOKEN = 8;
const HEADING_TOKEN = 10;
const ALTITUDE_TOKEN = 12;

export class VideoLogBlockError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VideoLogBlockError';
  }
}

export interface SkippedBlock {
  counter: number;
  line: number; // 1-based line of the counter
  reason: string;
}

export interface VideoLogParseResult {
  records: VideoLogRecord[];
  skipped: SkippedBlock[];
}

/**
 * Parse `H:MM:SS,ffffff` into seconds. The fraction is read like
 * microseconds, so `,5` is half a second.
 */
export function parseFrameTimestamp(text: string): number {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) {
    throw new VideoLogBlockError(`Invalid frame timestamp "${text}"`);
  }
  const [, hours, minutes, seconds, fraction] = match;
  if (Number(minutes) > 59 || Number(seconds) > 59) {
    throw new VideoLogBlockError(`Frame timestamp out of range "${text}"`);
  }
  const micros = Number(fraction.padEnd(6, '0'));
  return roundTo(Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds) + micros / 1e6);
}

export function parseTimingLine(line: string): { frameStart: number; frameEnd: number } {
  const parts = line.split(TIMING_SEPARATOR);
  if (parts.length !== 2) {
    throw new VideoLogBlockError(`Expected "start ${TIMING_SEPARATOR} end", got "${line}"`);
  }
  return {
    frameStart: parseFrameTimestamp(parts[0]),
    // The end side carries a stray leading space
    frameEnd: parseFrameTimestamp(parts[1]),
  };
}

function numberAt(tokens: string[], index: number, label: string): number {
  const token = tokens[index]?.trim();
  const value = token ? Number(token) : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new VideoLogBlockError(`${label} (token ${index}) is not a number: "${tokens[index] ?? ''}"`);
  }
  return value;
}

function axisToDecimal(
  tokens: string[],
  indexes: readonly [number, number, number],
  refIndex: number,
  negativeRef: 'S' | 'W',
  label: string
): number {
  const [degrees, minutes, seconds] = indexes.map((index) =>
    toRational(numberAt(tokens, index, label))
  );
  const ref = tokens[refIndex]?.trim().toUpperCase() === negativeRef ? negativeRef : 'N';
  return dmsToDecimal([degrees, minutes, seconds], ref);
}

export function parseCoordinateLine(
  line: string
): Pick<VideoLogRecord, 'latitude' | 'longitude' | 'headingDeg' | 'altitudeM'> {
  const tokens = line.trim().split(COORDINATE_DELIMITERS);
  return {
    latitude: axisToDecimal(tokens, LAT_TOKENS, LAT_REF_TOKEN, 'S', 'latitude'),
    longitude: axisToDecimal(tokens, LNG_TOKENS, LNG_REF_TOKEN, 'W', 'longitude'),
    headingDeg: numberAt(tokens, HEADING_TOKEN, 'heading'),
    altitudeM: numberAt(tokens, ALTITUDE_TOKEN, 'altitude'),
  };
}

function parseBlock(lines: string[], counterIndex: number): VideoLogRecord {
  const timingLine = lines[counterIndex + 1];
  const datetimeLine = lines[counterIndex + 2];
  const coordinateLine = lines[counterIndex + 3];
  if (timingLine === undefined || datetimeLine === undefined || coordinateLine === undefined) {
    throw new VideoLogBlockError('Block is truncated');
  }

  const captureTime = datetimeLine.trim();
  if (!captureTime) {
    throw new VideoLogBlockError('Datetime line is empty');
  }

  const { frameStart, frameEnd } = parseTimingLine(timingLine);
  return {
    captureTime,
    ...parseCoordinateLine(coordinateLine),
    frameStart,
    frameEnd,
  };
}

/**
 * Scan a log for numbered blocks.
 *
 * A line holding exactly the next expected counter opens a block and
 * advances the counter, whether or not the block then parses. A block that
 * throws for any reason is left out and reported in `skipped`; scanning
 * resumes on the line after its counter.
 */
export function parseVideoLogDetailed(text: string): VideoLogParseResult {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  const records: VideoLogRecord[] = [];
  const skipped: SkippedBlock[] = [];
  let counter = 1;

  for (let index = 0; index < lines.length; index++) {
    const candidate = lines[index].trim();
    if (!INTEGER_PATTERN.test(candidate) || Number(candidate) !== counter) {
      continue;
    }

    const blockNumber = counter;
    counter += 1;
    try {
      records.push(parseBlock(lines, index));
    } catch (error) {
      skipped.push({ counter: blockNumber, line: index + 1, reason: (error as Error).message });
    }
  }

  return { records, skipped };
}

export function parseVideoLog(text: string): VideoLogRecord[] {
  return parseVideoLogDetailed(text).records;
}
