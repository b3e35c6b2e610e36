import { describe, expect, it } from "vitest";
import { ConfigurationError, ErrorCode } from "@teabase/contracts";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("resolves default paths against the working directory", () => {
    expect(loadConfig({}, "/srv/shop")).toEqual({
      rawInput: "/srv/shop/data/raw/pos_export.csv",
      referenceDir: "/srv/shop/data/reference",
      outputDir: "/srv/shop/data/output",
      runOptions: { iceFallback: "nearest" }
    });
  });

  it("reads run options and treats blank values as unset", () => {
    const config = loadConfig(
      {
        TEABASE_OUTPUT_DIR: "/tmp/teabase-out",
        TEABASE_START_DATE: "2026-01-01",
        TEABASE_END_DATE: " ",
        TEABASE_ICE_FALLBACK: "lower"
      },
      "/srv/shop"
    );
    expect(config.outputDir).toBe("/tmp/teabase-out");
    expect(config.runOptions).toEqual({ startDate: "2026-01-01", iceFallback: "lower" });
  });

  it("rejects unknown fallback policies", () => {
    let caught: unknown;
    try {
      loadConfig({ TEABASE_ICE_FALLBACK: "closest" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.code).toBe(ErrorCode.INVALID_CONSTANT);
      expect(caught.issues[0]?.message.startsWith("TEABASE_ICE_FALLBACK")).toBe(true);
    }
  });

  it("rejects malformed dates", () => {
    expect(() => loadConfig({ TEABASE_START_DATE: "01/05/2026" })).toThrow(ConfigurationError);
  });
});
