import { describe, expect, it } from "vitest";
import {
  BOUNDARY_PREFIX,
  BOUNDARY_TOKEN_LENGTH,
  boundaryParameter,
  closeDelimiterLine,
  delimiterLine,
  generateBoundaryToken,
  multipartContentType,
} from "../boundary.js";

const DIGITS_ONLY = /^\d{29}$/;

/** Random source that replays 0..9 in a loop */
const cycling = () => {
  let i = 0;
  return () => i++ % 10;
};

describe("generateBoundaryToken", () => {
  it("produces 29 decimal digits by default", () => {
    const token = generateBoundaryToken();
    expect(BOUNDARY_TOKEN_LENGTH).toBe(29);
    expect(token).toMatch(DIGITS_ONLY);
  });

  it("draws every digit from the injected source", () => {
    expect(generateBoundaryToken(cycling())).toBe(
      "01234567890123456789012345678"
    );
  });

  it("honours a custom length", () => {
    expect(generateBoundaryToken(() => 7, 4)).toBe("7777");
  });

  it("rejects a source that returns something other than a digit", () => {
    expect(() => generateBoundaryToken(() => 10)).toThrow(RangeError);
    expect(() => generateBoundaryToken(() => 1.5)).toThrow(
      "random source returned 1.5, expected 0-9"
    );
  });

  it("does not repeat across 1000 tokens", () => {
    const tokens = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      tokens.add(generateBoundaryToken());
    }
    expect(tokens.size).toBe(1000);
  });
});

describe("boundary lines", () => {
  const parameter = boundaryParameter("123");

  it("prefixes the token with 27 hyphens", () => {
    expect(BOUNDARY_PREFIX).toBe("---------------------------");
    expect(parameter).toBe(`${"-".repeat(27)}123`);
  });

  it("builds delimiter, closing delimiter and header value from one parameter", () => {
    expect(delimiterLine(parameter)).toBe(`${"-".repeat(29)}123\r\n`);
    expect(closeDelimiterLine(parameter)).toBe(`${"-".repeat(29)}123--\r\n`);
    expect(multipartContentType(parameter)).toBe(
      `multipart/form-data; boundary=${"-".repeat(27)}123`
    );
  });
});
