import { randomInt } from "node:crypto";
import type { RandomSource } from "./types.js";

/** Number of random digits in a generated boundary token */
export const BOUNDARY_TOKEN_LENGTH = 29;

/** Hyphen run prepended to the token to form the boundary parameter */
export const BOUNDARY_PREFIX = "-".repeat(27);

const CRLF = "\r\n";

/** Process-wide crypto RNG, used unless a builder is given its own source */
export const cryptoRandom: RandomSource = (maxExclusive) =>
  randomInt(maxExclusive);

/**
 * Generate a boundary token of decimal digits.
 * The source is asked for one digit at a time, so a scripted source
 * in tests yields a predictable token.
 */
export function generateBoundaryToken(
  random: RandomSource = cryptoRandom,
  length = BOUNDARY_TOKEN_LENGTH
): string {
  let token = "";
  for (let i = 0; i < length; i++) {
    const digit = random(10);
    if (!Number.isInteger(digit) || digit < 0 || digit > 9) {
      throw new RangeError(`random source returned ${digit}, expected 0-9`);
    }
    token += String(digit);
  }
  return token;
}

/** The `boundary=` parameter value: hyphen prefix followed by the token */
export const boundaryParameter = (token: string) =>
  `${BOUNDARY_PREFIX}${token}`;

/** Delimiter line that opens every part */
export const delimiterLine = (parameter: string) =>
  `--${parameter}${CRLF}`;

/** Closing delimiter line that ends the body */
export const closeDelimiterLine = (parameter: string) =>
  `--${parameter}--${CRLF}`;

/** Header value announcing the body's media type and boundary */
export const multipartContentType = (parameter: string) =>
  `multipart/form-data; boundary=${parameter}`;
