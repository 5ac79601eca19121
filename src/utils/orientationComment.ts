/**
 * Orientation sensor angles the camera app writes into the EXIF UserComment.
 *
 * The comment is a positional encoding: split on NUL, `^`, `:` and `,`,
 * yaw, pitch and roll sit at tokens 4, 6 and 8.
 */
export interface OrientationAngles {
  yawDeg: number;
  pitchDeg: number;
  rollDeg: number;
}

const COMMENT_DELIMITERS = /[\x00^:,]/;
const YAW_TOKEN = 4;
const PITCH_TOKEN = 6;
const ROLL_TOKEN = 8;

export class OrientationCommentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OrientationCommentError';
  }
}

/**
 * Decode a UserComment value to text. Bytes are read as latin1 so the
 * NUL padding of the character-code prefix survives.
 */
export function decodeComment(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('latin1');
  }
  return undefined;
}

/**
 * Strict float parse: surrounding whitespace is allowed, nothing else
 */
export function parseDecimal(token: string | undefined, label: string): number {
  const trimmed = token?.trim();
  if (!trimmed) {
    throw new OrientationCommentError(`${label} is empty`);
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    throw new OrientationCommentError(`${label} is not a number: "${trimmed}"`);
  }
  return value;
}

export function parseOrientationComment(comment: string): OrientationAngles {
  const tokens = comment.split(COMMENT_DELIMITERS);
  return {
    yawDeg: parseDecimal(tokens[YAW_TOKEN], `yaw (token ${YAW_TOKEN})`),
    pitchDeg: parseDecimal(tokens[PITCH_TOKEN], `pitch (token ${PITCH_TOKEN})`),
    rollDeg: parseDecimal(tokens[ROLL_TOKEN], `roll (token ${ROLL_TOKEN})`),
  };
}
