/**
 * Tests for logging configuration.
 */
import { describe, it, expect } from "vitest";

import { getLogger, isLoggingSilent, loggingConfig, resolveLogLevel } from "../src";

describe("resolveLogLevel", () => {
  it("uses the service default", () => {
    expect(resolveLogLevel("dry", {})).toBe(loggingConfig.services.dry.level);
    expect(resolveLogLevel("codegen", {})).toBe("warn");
  });

  it("turns on debug output with IMPERATIVE_DEBUG", () => {
    expect(resolveLogLevel("direct", { IMPERATIVE_DEBUG: "true" })).toBe("debug");
    expect(resolveLogLevel("direct", { IMPERATIVE_DEBUG: "1" })).toBe("warn");
  });

  it("lets LOG_LEVEL win", () => {
    expect(resolveLogLevel("direct", { LOG_LEVEL: "silly", IMPERATIVE_DEBUG: "true" })).toBe("silly");
  });
});

describe("isLoggingSilent", () => {
  it("mutes console output under test", () => {
    expect(isLoggingSilent({ NODE_ENV: "test" })).toBe(true);
    expect(isLoggingSilent({ NODE_ENV: "test", LOG_LEVEL: "info" })).toBe(false);
    expect(isLoggingSilent({ NODE_ENV: "production" })).toBe(false);
  });
});

describe("getLogger", () => {
  it("creates one logger per service", () => {
    expect(getLogger("dry")).toBe(getLogger("dry"));
    expect(getLogger("dry")).not.toBe(getLogger("codegen"));
  });
});
