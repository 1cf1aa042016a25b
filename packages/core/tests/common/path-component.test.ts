import { describe, expect, it } from "vitest";
import { isPathComponent, validatePathComponent } from "../../src/common/paths/path-component.js";
import { PathComponentError } from "../../src/errors/tree-entry-errors.js";

describe("path components", () => {
  it("accepts ordinary names", () => {
    for (const name of ["a", "main.rs", ".gitignore", "...", "with space", "日本語"]) {
      expect(isPathComponent(name)).toBe(true);
      expect(() => validatePathComponent(name)).not.toThrow();
    }
  });

  it("rejects empty and relative names", () => {
    expect(isPathComponent("")).toBe(false);
    expect(isPathComponent(".")).toBe(false);
    expect(isPathComponent("..")).toBe(false);
    expect(() => validatePathComponent("..")).toThrow("Path component cannot be '..'");
  });

  it("rejects separators and NUL", () => {
    expect(isPathComponent("a/b")).toBe(false);
    expect(isPathComponent("/")).toBe(false);
    expect(isPathComponent("a\0")).toBe(false);
    expect(() => validatePathComponent("a/b")).toThrow(PathComponentError);
  });

  it("carries the rejected component", () => {
    try {
      validatePathComponent("x\0y");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PathComponentError);
      if (error instanceof PathComponentError) {
        expect(error.component).toBe("x\0y");
        expect(error.message).toBe("Path component cannot contain null bytes");
      }
    }
  });
});
