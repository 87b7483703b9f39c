import { describe, it, expect } from "vitest";
import { ConfigError, DEFAULT_ANALYSIS_CONFIG, getAnalysisConfig } from "../src/config.js";

describe("getAnalysisConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(getAnalysisConfig({})).toEqual({ tolerance: 30, topK: 10, topKPerVendor: 3, logLevel: "info" });
    expect(getAnalysisConfig({})).toEqual(DEFAULT_ANALYSIS_CONFIG);
  });

  it("treats blank values as unset", () => {
    expect(getAnalysisConfig({ INVENTORY_TOLERANCE: "  ", INVENTORY_LOG_LEVEL: "" })).toEqual(DEFAULT_ANALYSIS_CONFIG);
  });

  it("reads every key from the environment", () => {
    const config = getAnalysisConfig({
      INVENTORY_TOLERANCE: "12.5",
      INVENTORY_TOP_K: "5",
      INVENTORY_TOP_K_PER_VENDOR: "2",
      INVENTORY_LOG_LEVEL: "DEBUG",
    });
    expect(config).toEqual({ tolerance: 12.5, topK: 5, topKPerVendor: 2, logLevel: "debug" });
  });

  it("rejects invalid values and names the offending variables", () => {
    let caught: unknown;
    try {
      getAnalysisConfig({ INVENTORY_TOLERANCE: "-5", INVENTORY_TOP_K: "2.5", INVENTORY_LOG_LEVEL: "verbose" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toHaveLength(3);
    expect(caught.issues[0]).toBe("INVENTORY_TOLERANCE: Must be a positive percentage");
    expect(caught.issues[1].startsWith("INVENTORY_TOP_K: ")).toBe(true);
    expect(caught.issues[2].startsWith("INVENTORY_LOG_LEVEL: ")).toBe(true);
    expect(caught.message.startsWith("Invalid inventory configuration: INVENTORY_TOLERANCE:")).toBe(true);
  });

  it("rejects non-numeric numbers", () => {
    expect(() => getAnalysisConfig({ INVENTORY_TOP_K_PER_VENDOR: "three" })).toThrow(ConfigError);
  });
});
