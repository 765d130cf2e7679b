import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, isLogLevel, setLogLevel } from "./logger";

describe("createLogger", () => {
  afterEach(() => {
    setLogLevel("silent");
    vi.restoreAllMocks();
  });

  it("prefixes lines with the scope and drops levels below the threshold", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    setLogLevel("warn");

    const log = createLogger("contratos");
    log.debug("ignorado");
    log.warn("página vazia", { page: 3 });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[contratos] página vazia", { page: 3 });
  });

  it("emits nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("silent");

    createLogger("x").error("falha");

    expect(error).not.toHaveBeenCalled();
  });
});

describe("isLogLevel", () => {
  it("accepts only known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
