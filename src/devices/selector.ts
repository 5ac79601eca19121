import { DeviceProfile } from '../types/DeviceProfile';
import { DEVICE_PROFILES, deviceProfileKey } from './registry';

/**
 * Look up the sensor profile for an EXIF Make/Model pair (case-insensitive)
 *
 * @param extraProfiles - Profiles from configuration, checked before the built-in table
 * @returns The matching profile, or undefined for an unknown device
 */
export function findDeviceProfile(
  make: string | undefined,
  model: string | undefined,
  extraProfiles: readonly DeviceProfile[] = []
): DeviceProfile | undefined {
  if (!make || !model) {
    return undefined;
  }

  const key = deviceProfileKey(make, model);
  const configured = extraProfiles.find(
    (profile) => deviceProfileKey(profile.make, profile.model) === key
  );
  return configured ?? DEVICE_PROFILES[key];
}
