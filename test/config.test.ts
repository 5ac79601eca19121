import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { GeotagConfigError, loadConfig, loadInlineConfig } from '../src/config';

const fixturePath = path.join(__dirname, 'fixtures', 'basic.config.json');

describe('loadConfig', () => {
  it('uses defaults when no config file is given', async () => {
    const config = await loadConfig(undefined, { env: {} });

    expect(config).toEqual({
      sourcePath: undefined,
      outputDir: process.cwd(),
      imageTableName: 'metaData.csv',
      include: '*.{jpg,jpeg}',
      retry: { mode: 'prompt' },
      deviceProfiles: [],
    });
  });

  it('loads config files and resolves paths against the file', async () => {
    const config = await loadConfig(fixturePath, { env: {} });

    expect(config.sourcePath).toBe(fixturePath);
    expect(config.outputDir).toBe(path.join(__dirname, 'fixtures', 'out'));
    expect(config.imageTableName).toBe('survey.csv');
    expect(config.include).toBe('*.jpg');
    expect(config.retry).toEqual({ mode: 'backoff', delayMs: 250, maxAttempts: 5 });
    expect(config.deviceProfiles).toEqual([
      {
        make: 'google',
        model: 'pixel 4',
        sensorWidthMm: 5.64,
        sensorHeightMm: 4.23,
        horizontalFovDeg: 71.2,
      },
    ]);
  });

  it('lets the environment and CLI override the file', async () => {
    const fromEnv = await loadConfig(fixturePath, {
      env: { GEOTAG_OUTPUT_DIR: 'tables', GEOTAG_RETRY_MODE: 'prompt' },
    });
    expect(fromEnv.outputDir).toBe(path.resolve(process.cwd(), 'tables'));
    expect(fromEnv.retry).toEqual({ mode: 'prompt' });

    const fromCli = await loadConfig(fixturePath, {
      env: { GEOTAG_OUTPUT_DIR: 'tables' },
      outputDir: 'cli-out',
      include: '*.jpeg',
    });
    expect(fromCli.outputDir).toBe(path.resolve(process.cwd(), 'cli-out'));
    expect(fromCli.include).toBe('*.jpeg');
  });

  it('expands a leading tilde in the output directory', async () => {
    const config = await loadConfig(undefined, { env: {}, outputDir: '~/geotag' });
    expect(config.outputDir).toBe(path.join(os.homedir(), 'geotag'));
  });

  it('reports unreadable and empty config files', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'geotag-config-'));
    try {
      const emptyPath = path.join(tempDir, 'empty.json');
      await fs.writeFile(emptyPath, '  \n');

      await expect(loadConfig(emptyPath, { env: {} })).rejects.toThrow('Config file is empty.');
      await expect(
        loadConfig(path.join(tempDir, 'missing.json'), { env: {} })
      ).rejects.toBeInstanceOf(GeotagConfigError);
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });
});

describe('loadInlineConfig', () => {
  it('applies backoff defaults when only the mode is set', () => {
    const config = loadInlineConfig({ retry: { mode: 'backoff' } }, { env: {} });
    expect(config.retry).toEqual({ mode: 'backoff', delayMs: 1000, maxAttempts: 5 });
  });

  it('switches to backoff for non-interactive runs', () => {
    const config = loadInlineConfig({}, { env: {}, retryMode: 'backoff' });
    expect(config.retry.mode).toBe('backoff');
  });

  it('rejects invalid values', () => {
    expect(() => loadInlineConfig([], { env: {} })).toThrow('Config root must be an object.');
    expect(() => loadInlineConfig({ retry: 'always' }, { env: {} })).toThrow(
      '`retry` must be an object.'
    );
    expect(() => loadInlineConfig({ retry: { mode: 'forever' } }, { env: {} })).toThrow(
      'retry.mode must be one of: prompt, backoff.'
    );
    expect(() => loadInlineConfig({}, { env: { GEOTAG_RETRY_MODE: 'never' } })).toThrow(
      'GEOTAG_RETRY_MODE must be one of: prompt, backoff.'
    );
    expect(() =>
      loadInlineConfig({ retry: { mode: 'backoff', maxAttempts: 0 } }, { env: {} })
    ).toThrow('retry.maxAttempts must be a positive integer.');
    expect(() => loadInlineConfig({ imageTableName: 'out/meta.csv' }, { env: {} })).toThrow(
      'imageTableName must be a file name, not a path.'
    );
  });

  it('names the offending device profile field', () => {
    expect(() =>
      loadInlineConfig(
        { deviceProfiles: [{ make: 'Google', model: 'Pixel 4', sensorWidthMm: -1 }] },
        { env: {} }
      )
    ).toThrow(/^Invalid device profiles\. deviceProfiles\.0\.sensorWidthMm: /);
  });
});
