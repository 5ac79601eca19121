import fs from 'fs/promises';
import path from 'path';

import { logger as defaultLogger, Logger } from '../logger';
import { TableRow } from '../export/csv';
import { writeTable } from '../export/TableExporter';
import { RetryPolicy } from '../export/retryPolicy';
import { VideoLogRecord } from '../types/VideoLogMetadata';
import { assertRegularFile } from '../utils/files';
import { parseVideoLogDetailed } from './videoLogParser';

export const VIDEO_TABLE_COLUMNS = [
  'datetime',
  'lat',
  'lng',
  'heading',
  'altitude',
  'frame_start',
  'frame_end',
] as const;

export interface VideoLogExtractorOptions {
  logger?: Logger;
  retryPolicy?: RetryPolicy;
  /** Directory for exported tables, defaults to the working directory */
  outputDir?: string;
}

export interface VideoLogExtractOptions {
  writeTable?: boolean;
  /** Overrides the name derived from the log file */
  outputPath?: string;
}

/**
 * Reads the subtitle log written alongside a video recording.
 * Lenient: blocks that do not parse are dropped, only an unreadable file fails.
 */
export class VideoLogExtractor {
  private readonly logger: Logger;

  constructor(private readonly options: VideoLogExtractorOptions = {}) {
    this.logger = (options.logger ?? defaultLogger).child({ scope: 'video' });
  }

  /**
   * @param filePath - Path to the log file
   * @throws FileNotFoundError if the path is not a regular file
   */
  async extractVideoLog(
    filePath: string,
    options: VideoLogExtractOptions = {}
  ): Promise<VideoLogRecord[]> {
    await assertRegularFile(filePath);
    this.logger.info({ file: filePath }, 'Reading video log.');

    const text = await fs.readFile(filePath, 'utf8');
    const { records, skipped } = parseVideoLogDetailed(text);
    for (const block of skipped) {
      this.logger.debug({ file: filePath, ...block }, 'Skipped malformed block.');
    }

    if (options.writeTable) {
      const targetPath = options.outputPath ?? this.tablePathFor(filePath);
      this.logger.info({ file: targetPath }, 'Saving to csv.');
      await writeTable(VIDEO_TABLE_COLUMNS, records.map(videoRecordToRow), targetPath, {
        retryPolicy: this.options.retryPolicy,
        logger: this.logger,
      });
    }

    this.logger.info({ records: records.length, skipped: skipped.length }, 'Done.');
    return records;
  }

  /**
   * `<dir>/flight.srt` becomes `<outputDir>/flight.csv`
   */
  tablePathFor(filePath: string): string {
    const baseName = path.basename(filePath, path.extname(filePath));
    return path.resolve(this.options.outputDir ?? process.cwd(), `${baseName}.csv`);
  }
}

export function videoRecordToRow(record: VideoLogRecord): TableRow {
  return {
    datetime: record.captureTime,
    lat: record.latitude,
    lng: record.longitude,
    heading: record.headingDeg,
    altitude: record.altitudeM,
    frame_start: record.frameStart,
    frame_end: record.frameEnd,
  };
}

export function extractVideoLog(
  filePath: string,
  writeTableFlag: boolean,
  options?: VideoLogExtractorOptions
): Promise<VideoLogRecord[]> {
  return new VideoLogExtractor(options).extractVideoLog(filePath, {
    writeTable: writeTableFlag,
  });
}
