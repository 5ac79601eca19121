import { z } from 'zod';
import { DeviceProfile } from '../types/DeviceProfile';

/**
 * Known phone sensor geometry, keyed by `make/model` in lower case.
 * Adding a device is a data change here or in the config file.
 */
export const DEVICE_PROFILES: Record<string, DeviceProfile> = {
  'samsung/sm-a505f': {
    make: 'samsung',
    model: 'sm-a505f',
    sensorWidthMm: 5.18,
    sensorHeightMm: 3.89,
    horizontalFovDeg: 66.8,
  },
};

export const deviceProfileSchema = z.object({
  make: z.string().trim().min(1),
  model: z.string().trim().min(1),
  sensorWidthMm: z.number().positive(),
  sensorHeightMm: z.number().positive(),
  horizontalFovDeg: z.number().positive().max(360),
});

export const deviceProfileListSchema = z.array(deviceProfileSchema);

export function deviceProfileKey(make: string, model: string): string {
  return `${make.trim().toLowerCase()}/${model.trim().toLowerCase()}`;
}

/**
 * Normalize profiles from untrusted input (config files)
 *
 * @throws ZodError if an entry does not match the profile shape
 */
export function parseDeviceProfiles(value: unknown): DeviceProfile[] {
  return deviceProfileListSchema.parse(value).map((profile) => ({
    ...profile,
    make: profile.make.toLowerCase(),
    model: profile.model.toLowerCase(),
  }));
}
