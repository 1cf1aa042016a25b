import { decodeTreeEntry } from "@treekit/core";
import { ByteCursor, type Logger, setLogger } from "@treekit/utils";
import { afterEach, describe, expect, it, vi } from "vitest";
import { type ConsoleOutput, createConsoleLogger } from "../src/logging/index.js";

function createOutput(): ConsoleOutput & Record<keyof ConsoleOutput, ReturnType<typeof vi.fn>> {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("createConsoleLogger", () => {
  afterEach(() => {
    setLogger(undefined);
  });

  it("writes info and above by default", () => {
    const output = createOutput();
    const logger: Logger = createConsoleLogger({ output });

    expect(logger.debug).toBeUndefined();
    logger.info?.("hello", 1);
    logger.error?.("failed");

    expect(output.info).toHaveBeenCalledWith("hello", 1);
    expect(output.error).toHaveBeenCalledWith("failed");
    expect(output.debug).not.toHaveBeenCalled();
  });

  it("drops levels below the threshold", () => {
    const logger = createConsoleLogger({ level: "error", output: createOutput() });

    expect(logger.debug).toBeUndefined();
    expect(logger.info).toBeUndefined();
    expect(logger.warn).toBeUndefined();
    expect(logger.error).toBeDefined();
  });

  it("prepends the prefix", () => {
    const output = createOutput();
    const logger = createConsoleLogger({ level: "debug", prefix: "[tree]", output });

    logger.debug?.("step", 2);

    expect(output.debug).toHaveBeenCalledWith("[tree]", "step", 2);
  });

  it("receives codec diagnostics once registered", () => {
    const output = createOutput();
    setLogger(createConsoleLogger({ output }));

    expect(decodeTreeEntry(new ByteCursor(new Uint8Array([1, 2])))).toBeUndefined();
    expect(output.error).toHaveBeenCalledWith(
      "Can not read tree entry id size, bytes remaining 1 need 2",
    );
  });
});
