import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { ZodError } from 'zod';

import { parseDeviceProfiles } from './devices/registry';
import {
  createBackoffRetryPolicy,
  createPromptRetryPolicy,
  DEFAULT_BACKOFF,
  RetryPolicy,
} from './export/retryPolicy';
import { DEFAULT_IMAGE_TABLE_NAME } from './metadata/ImageMetadataExtractor';
import { DeviceProfile } from './types/DeviceProfile';
import { DEFAULT_IMAGE_PATTERN } from './utils/files';

export const RETRY_MODES = ['prompt', 'backoff'] as const;

export type RetryMode = typeof RETRY_MODES[number];

export type RetryConfig =
  | { mode: 'prompt' }
  | { mode: 'backoff'; delayMs: number; maxAttempts: number };

interface RawRootConfig {
  outputDir?: unknown;
  imageTableName?: unknown;
  include?: unknown;
  retry?: unknown;
  deviceProfiles?: unknown;
}

export type GeotagConfigInput = RawRootConfig;

export interface GeotagConfig {
  sourcePath?: string;
  outputDir: string;
  imageTableName: string;
  include: string;
  retry: RetryConfig;
  deviceProfiles: DeviceProfile[];
}

export interface LoadConfigOptions {
  /** CLI overrides, applied after the environment */
  outputDir?: string;
  include?: string;
  retryMode?: RetryMode;
  env?: NodeJS.ProcessEnv;
}

export class GeotagConfigError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'GeotagConfigError';
  }
}

/**
 * Load the optional JSON config file and apply environment and CLI overrides
 *
 * @param providedPath - Config file path, or undefined for defaults only
 */
export async function loadConfig(
  providedPath: string | undefined,
  options: LoadConfigOptions = {}
): Promise<GeotagConfig> {
  if (!providedPath) {
    return loadInlineConfig({}, options);
  }

  const absolutePath = path.resolve(providedPath);
  let fileContents: string;
  try {
    fileContents = await fs.readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new GeotagConfigError(
      `Unable to read config at ${absolutePath}: ${(error as Error).message}`,
      error
    );
  }

  if (!fileContents.trim()) {
    throw new GeotagConfigError('Config file is empty.');
  }

  const parsed = parseConfigFile(fileContents, absolutePath);
  return loadInlineConfig(parsed, { ...options, sourcePath: absolutePath });
}

export function loadInlineConfig(
  config: unknown,
  options: LoadConfigOptions & { sourcePath?: string } = {}
): GeotagConfig {
  return normalizeConfig(config, options.sourcePath, options);
}

function parseConfigFile(contents: string, filename: string): unknown {
  const ext = path.extname(filename).toLowerCase();
  if (ext && ext !== '.json') {
    throw new GeotagConfigError(`Unsupported config extension "${ext}". Use JSON.`);
  }

  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new GeotagConfigError(`Unable to parse config file ${filename} as JSON.`, error);
  }
}

function normalizeConfig(
  rawConfig: unknown,
  sourcePath: string | undefined,
  options: LoadConfigOptions
): GeotagConfig {
  if (!isPlainObject(rawConfig)) {
    throw new GeotagConfigError('Config root must be an object.');
  }

  const root: RawRootConfig = rawConfig;
  const env = options.env ?? process.env;
  const baseDir = sourcePath ? path.dirname(sourcePath) : process.cwd();

  // CLI and environment paths are relative to the working directory,
  // config file paths to the config file
  const outputOverride = options.outputDir ?? nonEmpty(env.GEOTAG_OUTPUT_DIR);
  const fileOutputDir = expectOptionalString(root.outputDir, 'outputDir');
  const outputDir = outputOverride
    ? resolvePath(outputOverride, process.cwd())
    : fileOutputDir
      ? resolvePath(fileOutputDir, baseDir)
      : process.cwd();

  const imageTableName =
    expectOptionalString(root.imageTableName, 'imageTableName') ?? DEFAULT_IMAGE_TABLE_NAME;
  if (path.basename(imageTableName) !== imageTableName) {
    throw new GeotagConfigError('imageTableName must be a file name, not a path.');
  }

  const include =
    options.include ?? expectOptionalString(root.include, 'include') ?? DEFAULT_IMAGE_PATTERN;

  const envRetryMode = nonEmpty(env.GEOTAG_RETRY_MODE);
  const retryModeOverride =
    options.retryMode ??
    (envRetryMode === undefined ? undefined : expectRetryMode(envRetryMode, 'GEOTAG_RETRY_MODE'));
  const retry = normalizeRetryConfig(root.retry, retryModeOverride);

  return {
    sourcePath,
    outputDir,
    imageTableName,
    include,
    retry,
    deviceProfiles: normalizeDeviceProfiles(root.deviceProfiles),
  };
}

function normalizeRetryConfig(rawRetry: unknown, modeOverride?: RetryMode): RetryConfig {
  if (rawRetry !== undefined && !isPlainObject(rawRetry)) {
    throw new GeotagConfigError('`retry` must be an object.');
  }

  const retry: Record<string, unknown> = isPlainObject(rawRetry) ? rawRetry : {};
  const mode =
    modeOverride ??
    (retry.mode === undefined ? 'prompt' : expectRetryMode(retry.mode, 'retry.mode'));

  if (mode === 'prompt') {
    return { mode };
  }

  const delayMs =
    retry.delayMs === undefined
      ? DEFAULT_BACKOFF.delayMs
      : expectNonNegativeInteger(retry.delayMs, 'retry.delayMs');
  const maxAttempts =
    retry.maxAttempts === undefined
      ? DEFAULT_BACKOFF.maxAttempts
      : expectPositiveInteger(retry.maxAttempts, 'retry.maxAttempts');

  return { mode, delayMs, maxAttempts };
}

function normalizeDeviceProfiles(value: unknown): DeviceProfile[] {
  if (value === undefined) {
    return [];
  }
  try {
    return parseDeviceProfiles(value);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues
        .map((issue) => `deviceProfiles.${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new GeotagConfigError(`Invalid device profiles. ${details}`, error);
    }
    throw error;
  }
}

export function createRetryPolicy(config: RetryConfig): RetryPolicy {
  if (config.mode === 'backoff') {
    return createBackoffRetryPolicy({
      delayMs: config.delayMs,
      maxAttempts: config.maxAttempts,
    });
  }
  return createPromptRetryPolicy();
}

function expectRetryMode(value: unknown, label: string): RetryMode {
  const mode = RETRY_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new GeotagConfigError(`${label} must be one of: ${RETRY_MODES.join(', ')}.`);
  }
  return mode;
}

function expectString(value: unknown, label: string): string {
  if (typeof value !== 'string') {
    throw new GeotagConfigError(`${label} must be a string.`);
  }
  if (value.trim().length === 0) {
    throw new GeotagConfigError(`${label} cannot be empty.`);
  }
  return value;
}

function expectOptionalString(value: unknown, label: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return expectString(value, label);
}

function expectPositiveInteger(value: unknown, label: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new GeotagConfigError(`${label} must be a positive integer.`);
  }
  return value;
}

function expectNonNegativeInteger(value: unknown, label: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new GeotagConfigError(`${label} must be a non-negative integer.`);
  }
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

function resolvePath(targetPath: string, baseDir: string): string {
  // Expand tilde (~) to home directory
  let expandedPath = targetPath;
  if (targetPath.startsWith('~/') || targetPath === '~') {
    expandedPath = targetPath.replace(/^~/, os.homedir());
  }

  const candidate = path.isAbsolute(expandedPath)
    ? expandedPath
    : path.resolve(baseDir, expandedPath);
  return path.normalize(candidate);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
