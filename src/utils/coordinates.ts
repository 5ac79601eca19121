import { DmsTriplet, HemisphereRef, Rational } from '../types/Rational';

const DECIMAL_PLACES = 6;

/**
 * Divide a rational through
 *
 * @throws RangeError on a zero denominator
 */
export function reduceRational([numerator, denominator]: Rational): number {
  if (denominator === 0) {
    throw new RangeError(`Division by zero in rational ${numerator}/${denominator}`);
  }
  return numerator / denominator;
}

/**
 * exifr already divides rationals, so lift plain numbers back to n/1
 */
export function toRational(value: number): Rational {
  return [value, 1];
}

export function isHemisphereRef(value: unknown): value is HemisphereRef {
  return value === 'N' || value === 'S' || value === 'E' || value === 'W';
}

export function roundTo(value: number, places: number = DECIMAL_PLACES): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Convert a degrees/minutes/seconds triplet to signed decimal degrees
 *
 * South and West references give negative values.
 *
 * @param dms - Degrees, minutes and seconds as rationals
 * @param ref - Hemisphere reference letter
 * @returns Decimal degrees rounded to 6 places
 */
export function dmsToDecimal(dms: DmsTriplet, ref: HemisphereRef): number {
  let degrees = reduceRational(dms[0]);
  let minutes = reduceRational(dms[1]) / 60;
  let seconds = reduceRational(dms[2]) / 3600;
  if (ref === 'S' || ref === 'W') {
    degrees = -degrees;
    minutes = -minutes;
    seconds = -seconds;
  }
  return roundTo(degrees + minutes + seconds);
}
