import { afterEach, describe, expect, it, vi } from "vitest";
import { getLogger, type Logger, resolveLogger, setLogger } from "../../src/logging/index.js";

describe("logger registry", () => {
  afterEach(() => {
    setLogger(undefined);
  });

  it("is silent by default", () => {
    const logger = getLogger();
    expect(logger.error).toBeUndefined();
    expect(logger.debug).toBeUndefined();
  });

  it("returns the registered logger", () => {
    const logger: Logger = { error: vi.fn() };
    setLogger(logger);
    expect(getLogger()).toBe(logger);
  });

  it("prefers an explicit logger over the registered one", () => {
    const registered: Logger = { error: vi.fn() };
    const explicit: Logger = { error: vi.fn() };
    setLogger(registered);

    expect(resolveLogger({ logger: explicit })).toBe(explicit);
    expect(resolveLogger({})).toBe(registered);
    expect(resolveLogger()).toBe(registered);
  });

  it("restores the silent logger when cleared", () => {
    setLogger({ error: vi.fn() });
    setLogger(undefined);
    expect(getLogger().error).toBeUndefined();
  });
});
