import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { expandImagePaths } from '../../src/utils/files';

describe('expandImagePaths', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'geotag-files-'));
    await fs.mkdir(path.join(tempDir, 'photos', 'nested'), { recursive: true });
    for (const name of ['b.jpg', 'A.JPG', 'c.jpeg', 'notes.txt', 'nested/d.jpg']) {
      await fs.writeFile(path.join(tempDir, 'photos', name), '');
    }
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('lists matching files of a directory, sorted by name', async () => {
    const photos = path.join(tempDir, 'photos');
    expect(await expandImagePaths([photos])).toEqual([
      path.join(photos, 'A.JPG'),
      path.join(photos, 'b.jpg'),
      path.join(photos, 'c.jpeg'),
    ]);
  });

  it('honours a custom pattern', async () => {
    const photos = path.join(tempDir, 'photos');
    expect(await expandImagePaths([photos], '*.txt')).toEqual([path.join(photos, 'notes.txt')]);
  });

  it('keeps files and missing paths in the given order', async () => {
    const missing = path.join(tempDir, 'missing.jpg');
    const notes = path.join(tempDir, 'photos', 'notes.txt');
    expect(await expandImagePaths([missing, notes])).toEqual([missing, notes]);
  });
});
