import fs from 'fs/promises';
import path from 'path';

import { logger as defaultLogger, Logger } from '../logger';
import { formatTable, TableRow } from './csv';
import { createPromptRetryPolicy, RetryPolicy } from './retryPolicy';

export interface TableExportOptions {
  retryPolicy?: RetryPolicy;
  logger?: Logger;
}

export class TableExportError extends Error {
  constructor(
    message: string,
    public readonly targetPath: string,
    public readonly rowCount: number,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'TableExportError';
  }
}

/**
 * Write rows as a delimited table with a header line.
 *
 * The rendered table stays in memory across failed attempts; the retry
 * policy decides whether to try again (the default prompt policy always
 * does once the operator acknowledges).
 *
 * @param columns - Column names, in output order
 * @param rows - Records keyed by column name; missing values are written empty
 * @param targetPath - Destination file, parent directories are created
 * @throws TableExportError when the policy gives up or fails
 */
export async function writeTable(
  columns: readonly string[],
  rows: readonly TableRow[],
  targetPath: string,
  options: TableExportOptions = {}
): Promise<void> {
  const log = (options.logger ?? defaultLogger).child({ scope: 'export' });
  const retryPolicy = options.retryPolicy ?? createPromptRetryPolicy();
  const contents = formatTable(columns, rows);

  for (let attempt = 1; ; attempt++) {
    try {
      await fs.mkdir(path.dirname(targetPath), { recursive: true });
      await fs.writeFile(targetPath, contents, 'utf8');
      log.info({ file: targetPath, rows: rows.length }, 'Table saved.');
      return;
    } catch (error) {
      log.warn(
        { file: targetPath, attempt, err: (error as Error).message },
        'Could not write table.'
      );
      let retry: boolean;
      try {
        retry = await retryPolicy.shouldRetry(error, attempt, targetPath);
      } catch (policyError) {
        throw exportFailure(targetPath, attempt, rows.length, policyError);
      }
      if (!retry) {
        throw exportFailure(targetPath, attempt, rows.length, error);
      }
    }
  }
}

function exportFailure(
  targetPath: string,
  attempts: number,
  rowCount: number,
  cause: unknown
): TableExportError {
  return new TableExportError(
    `Unable to write ${targetPath} after ${attempts} attempt(s): ${(cause as Error).message}`,
    targetPath,
    rowCount,
    cause
  );
}
