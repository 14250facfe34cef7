import { describe, it, expect } from "vitest";
import { createLogger, runLogFileName, silentLogger } from "../logger.js";

describe("runLogFileName", () => {
  it("names the file after the run's start time", () => {
    expect(runLogFileName(new Date("2024-05-01T13:45:10.123Z"))).toBe("indexing_2024-05-01_13-45-10.log");
  });
});

describe("silentLogger", () => {
  it("drops every record", () => {
    const logger = silentLogger();

    expect(logger.level).toBe("silent");
    expect(logger.isLevelEnabled("fatal")).toBe(false);
  });
});

describe("createLogger", () => {
  it("builds a stdout logger at the configured level", () => {
    const logger = createLogger({ level: "warn" });

    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });
});
