import { describe, it, expect, vi } from "vitest";
import { DEFAULT_ENGINE_CONFIG, loadEngineConfig } from "./engineConfig";
import { silentLogger } from "./logger";

describe("loadEngineConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it("reads and coerces every variable", () => {
    expect(
      loadEngineConfig({
        PEER_GROUP_LIMIT: "3",
        PEER_POPULATION_BAND: "0.25",
        RATING_WINDOW_DAYS: "365",
        RED_FLAG_WINDOW_DAYS: " 30 ",
        AGGREGATION_CONCURRENCY: "16",
        DATA_ACCESS_TIMEOUT_MS: "2500",
        ENGINE_DEBUG: "TRUE",
      })
    ).toEqual({
      peerGroupLimit: 3,
      peerPopulationBand: 0.25,
      ratingWindowDays: 365,
      redFlagWindowDays: 30,
      aggregationConcurrency: 16,
      dataAccessTimeoutMs: 2500,
      debug: true,
    });
  });

  it("keeps the default and warns for an invalid value", () => {
    const warn = vi.fn();
    const config = loadEngineConfig(
      { PEER_POPULATION_BAND: "1.5", AGGREGATION_CONCURRENCY: "100", PEER_GROUP_LIMIT: "five" },
      { ...silentLogger, warn }
    );
    expect(config.peerPopulationBand).toBe(0.5);
    expect(config.aggregationConcurrency).toBe(8);
    expect(config.peerGroupLimit).toBe(5);
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledWith("invalid PEER_POPULATION_BAND, using default", { value: "1.5", default: 0.5 });
  });

  it("ignores blank values without warning", () => {
    const warn = vi.fn();
    expect(loadEngineConfig({ RATING_WINDOW_DAYS: "  " }, { ...silentLogger, warn }).ratingWindowDays).toBe(730);
    expect(warn).not.toHaveBeenCalled();
  });

  it("treats anything but 1/true/yes as debug off", () => {
    expect(loadEngineConfig({ ENGINE_DEBUG: "yes" }).debug).toBe(true);
    expect(loadEngineConfig({ ENGINE_DEBUG: "off" }).debug).toBe(false);
  });
});
