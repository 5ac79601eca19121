/**
 * EXIF rational value as a numerator/denominator pair
 */
export type Rational = readonly [numerator: number, denominator: number];

/**
 * Degrees, minutes and seconds of one coordinate axis
 */
export type DmsTriplet = readonly [degrees: Rational, minutes: Rational, seconds: Rational];

export type HemisphereRef = 'N' | 'S' | 'E' | 'W';
