import path from 'path';

import { ExifrTagReader } from '../../src/metadata/ExifTagReader';
import { ImageMetadataExtractor } from '../../src/metadata/ImageMetadataExtractor';
import { decodeComment } from '../../src/utils/orientationComment';
import { silentLogger } from '../helpers/silentLogger';

// Big-endian EXIF with Make/Model, an EXIF IFD (dimensions only as
// ExifImageWidth/Height, UserComment with an ASCII charset prefix) and a GPS IFD
const fixturePath = path.join(__dirname, '..', 'fixtures', 'geotagged.jpg');

describe('ExifrTagReader', () => {
  it('merges IFD0, the EXIF IFD and the user comment into tags', async () => {
    const tagSet = await new ExifrTagReader().read(fixturePath);

    expect(tagSet?.tags).toMatchObject({
      Make: 'samsung',
      Model: 'SM-A505F',
      DateTimeOriginal: '2021:03:14 09:26:53',
      ExifImageWidth: 4000,
      ExifImageHeight: 3000,
    });
    expect(decodeComment(tagSet?.tags.UserComment)?.endsWith('Yaw:12.5,Pitch:-3.25,Roll:1.75')).toBe(
      true
    );
    expect(tagSet?.gps).toMatchObject({ GPSLatitudeRef: 'S', GPSLongitudeRef: 'E' });
  });
});

describe('ImageMetadataExtractor with exifr', () => {
  it('extracts the full record from a real JPEG', async () => {
    const extractor = new ImageMetadataExtractor({ logger: silentLogger });

    const record = await extractor.extractImage(fixturePath);

    expect(record).toEqual({
      captureTime: '2021:03:14 09:26:53',
      frameWidth: 4000,
      frameHeight: 3000,
      focalLengthMm: 4.39,
      latitude: -33.867778,
      longitude: 151.208333,
      headingDeg: 271.5,
      altitudeM: 123.4,
      yawDeg: 12.5,
      pitchDeg: -3.25,
      rollDeg: 1.75,
      sensorWidthMm: 5.18,
      sensorHeightMm: 3.89,
      horizontalFovDeg: 66.8,
    });
  });

  it('names the image in batch output', async () => {
    const extractor = new ImageMetadataExtractor({ logger: silentLogger });

    const records = await extractor.extractImageBatch([fixturePath]);

    expect(records.map((record) => record.imageName)).toEqual(['geotagged.jpg']);
  });
});
