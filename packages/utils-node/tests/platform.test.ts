import { describe, expect, it } from "vitest";
import {
  detectPlatformCapabilities,
  parseBooleanFlag,
  SUPPORTS_SYMLINKS_ENV,
} from "../src/platform/index.js";

describe("detectPlatformCapabilities", () => {
  it("detects native symlinks on POSIX platforms", () => {
    for (const platform of ["linux", "darwin", "freebsd"] as const) {
      expect(detectPlatformCapabilities({ platform, env: {} })).toEqual({ supportsSymlinks: true });
    }
  });

  it("narrows symlinks on Windows", () => {
    expect(detectPlatformCapabilities({ platform: "win32", env: {} })).toEqual({
      supportsSymlinks: false,
    });
  });

  it("lets the environment override detection", () => {
    expect(
      detectPlatformCapabilities({ platform: "win32", env: { [SUPPORTS_SYMLINKS_ENV]: "1" } }),
    ).toEqual({ supportsSymlinks: true });
    expect(
      detectPlatformCapabilities({ platform: "linux", env: { [SUPPORTS_SYMLINKS_ENV]: "false" } }),
    ).toEqual({ supportsSymlinks: false });
  });

  it("ignores unrecognized override values", () => {
    expect(
      detectPlatformCapabilities({ platform: "win32", env: { [SUPPORTS_SYMLINKS_ENV]: "maybe" } }),
    ).toEqual({ supportsSymlinks: false });
  });

  it("uses the current process by default", () => {
    const override = parseBooleanFlag(process.env[SUPPORTS_SYMLINKS_ENV]);
    expect(detectPlatformCapabilities().supportsSymlinks).toBe(
      override ?? process.platform !== "win32",
    );
  });
});

describe("parseBooleanFlag", () => {
  it("parses common spellings", () => {
    expect(parseBooleanFlag("YES")).toBe(true);
    expect(parseBooleanFlag(" on ")).toBe(true);
    expect(parseBooleanFlag("0")).toBe(false);
    expect(parseBooleanFlag("Off")).toBe(false);
  });

  it("returns undefined for missing or unknown values", () => {
    expect(parseBooleanFlag(undefined)).toBeUndefined();
    expect(parseBooleanFlag("")).toBeUndefined();
    expect(parseBooleanFlag("2")).toBeUndefined();
  });
});
