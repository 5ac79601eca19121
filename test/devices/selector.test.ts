import { findDeviceProfile } from '../../src/devices/selector';
import { DEVICE_PROFILES, parseDeviceProfiles } from '../../src/devices/registry';

describe('Device profiles', () => {
  describe('findDeviceProfile', () => {
    it('matches the Samsung SM-A505F case-insensitively', () => {
      const profile = findDeviceProfile('Samsung', 'SM-A505F');
      expect(profile).toEqual({
        make: 'samsung',
        model: 'sm-a505f',
        sensorWidthMm: 5.18,
        sensorHeightMm: 3.89,
        horizontalFovDeg: 66.8,
      });
    });

    it('returns undefined for unknown devices', () => {
      expect(findDeviceProfile('Google', 'Pixel 4')).toBeUndefined();
      expect(findDeviceProfile('samsung', 'sm-g991b')).toBeUndefined();
    });

    it('returns undefined when make or model is missing', () => {
      expect(findDeviceProfile(undefined, 'SM-A505F')).toBeUndefined();
      expect(findDeviceProfile('samsung', undefined)).toBeUndefined();
    });

    it('checks configured profiles before the built-in table', () => {
      const override = {
        make: 'samsung',
        model: 'sm-a505f',
        sensorWidthMm: 6,
        sensorHeightMm: 4.5,
        horizontalFovDeg: 70,
      };
      expect(findDeviceProfile('SAMSUNG', 'sm-a505f', [override])).toBe(override);
      expect(DEVICE_PROFILES['samsung/sm-a505f'].sensorWidthMm).toBe(5.18);
    });
  });

  describe('parseDeviceProfiles', () => {
    it('lower-cases make and model', () => {
      expect(
        parseDeviceProfiles([
          {
            make: 'Google',
            model: 'Pixel 4',
            sensorWidthMm: 5.64,
            sensorHeightMm: 4.23,
            horizontalFovDeg: 77,
          },
        ])
      ).toEqual([
        {
          make: 'google',
          model: 'pixel 4',
          sensorWidthMm: 5.64,
          sensorHeightMm: 4.23,
          horizontalFovDeg: 77,
        },
      ]);
    });

    it('rejects entries without sensor geometry', () => {
      expect(() => parseDeviceProfiles([{ make: 'google', model: 'pixel 4' }])).toThrow();
    });
  });
});
