import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes lines with the tag", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("profile").warn("formula fallback", { metric: "x" });
    expect(warn).toHaveBeenCalledWith("[profile]", "formula fallback", { metric: "x" });
  });

  it("drops debug lines unless enabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("pool").debug("quiet");
    expect(log).not.toHaveBeenCalled();
    createLogger("pool", { debug: true }).debug("loud");
    expect(log).toHaveBeenCalledWith("[pool]", "loud");
  });
});
