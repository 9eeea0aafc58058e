import { describe, expect, it } from "vitest";
import {
  collect,
  parseFieldOptions,
  parseHeaderOptions,
  parseTimeout,
} from "../utils/options.js";

describe("collect", () => {
  it("appends each value", () => {
    expect(collect("b", collect("a", []))).toEqual(["a", "b"]);
  });
});

describe("parseFieldOptions", () => {
  it("splits on the first equals sign and keeps duplicates", () => {
    expect(parseFieldOptions(["a=1", "expr=x=y", "a=2", "empty="])).toEqual([
      ["a", "1"],
      ["expr", "x=y"],
      ["a", "2"],
      ["empty", ""],
    ]);
  });

  it("rejects entries without a key", () => {
    expect(() => parseFieldOptions(["novalue"])).toThrow(
      'Invalid field "novalue", expected key=value'
    );
    expect(() => parseFieldOptions(["=x"])).toThrow('Invalid field "=x"');
  });
});

describe("parseHeaderOptions", () => {
  it("trims names and values", () => {
    expect(
      parseHeaderOptions(["Authorization: Bearer test-token", "X-Id:42"])
    ).toEqual({ Authorization: "Bearer test-token", "X-Id": "42" });
  });

  it("rejects entries without a name", () => {
    expect(() => parseHeaderOptions([": value"])).toThrow(
      'Invalid header ": value", expected Name: value'
    );
    expect(() => parseHeaderOptions(["no-colon"])).toThrow("Invalid header");
  });
});

describe("parseTimeout", () => {
  it("parses positive integers", () => {
    expect(parseTimeout("2500")).toBe(2500);
    expect(parseTimeout(undefined)).toBeUndefined();
  });

  it("rejects anything else", () => {
    expect(() => parseTimeout("0")).toThrow(
      'Invalid timeout "0", expected a positive integer'
    );
    expect(() => parseTimeout("1.5")).toThrow("Invalid timeout");
    expect(() => parseTimeout("soon")).toThrow("Invalid timeout");
  });
});
