import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadColonyConfig, resolveColonyConfig } from "../config/colonyConfig";
import { DEFAULT_COLONY_CONFIG } from "../config/constants";
import { silentLogger } from "./fixtures";

describe("resolveColonyConfig", () => {
  it("returns the defaults for an empty object", () => {
    const logger = silentLogger();
    expect(resolveColonyConfig({}, logger)).toEqual(DEFAULT_COLONY_CONFIG);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("overlays valid fields on the defaults", () => {
    const config = resolveColonyConfig({ alpha: 2, maxIterations: 25 }, silentLogger());
    expect(config.alpha).toBe(2);
    expect(config.maxIterations).toBe(25);
    expect(config.beta).toBe(DEFAULT_COLONY_CONFIG.beta);
  });

  it("drops invalid fields and keeps the valid ones", () => {
    const logger = silentLogger();
    const config = resolveColonyConfig(
      { evaporationRate: 1.5, maxIterations: 2.5, beta: 4 },
      logger
    );

    expect(config.evaporationRate).toBe(0.1);
    expect(config.maxIterations).toBe(100);
    expect(config.beta).toBe(4);
    expect(logger.warn).toHaveBeenCalledWith("Ignoring invalid colony config fields", {
      fields: ["evaporationRate", "maxIterations"]
    });
  });

  it("ignores unknown keys", () => {
    const config = resolveColonyConfig({ colonySize: 40 }, silentLogger());
    expect(config).toEqual(DEFAULT_COLONY_CONFIG);
  });

  it("rejects non-object input", () => {
    const logger = silentLogger();
    expect(resolveColonyConfig("fast", logger)).toEqual(DEFAULT_COLONY_CONFIG);
    expect(logger.warn).toHaveBeenCalledWith("Colony config is not an object, using defaults");
  });
});

describe("loadColonyConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "colony-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads a JSON config file", () => {
    const file = path.join(dir, "colony.json");
    fs.writeFileSync(file, JSON.stringify({ evaporationRate: 0.25, maxPathLength: 4 }));

    const config = loadColonyConfig(file, silentLogger());
    expect(config.evaporationRate).toBe(0.25);
    expect(config.maxPathLength).toBe(4);
  });

  it("uses the defaults when the file is missing", () => {
    const logger = silentLogger();
    const file = path.join(dir, "missing.json");

    expect(loadColonyConfig(file, logger)).toEqual(DEFAULT_COLONY_CONFIG);
    expect(logger.warn).toHaveBeenCalledWith("Config file not found, using defaults", {
      filePath: file
    });
  });

  it("uses the defaults when the file is not JSON", () => {
    const logger = silentLogger();
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ alpha: ");

    expect(loadColonyConfig(file, logger)).toEqual(DEFAULT_COLONY_CONFIG);
    expect(logger.warn).toHaveBeenCalledWith(
      "Config file could not be parsed, using defaults",
      expect.objectContaining({ filePath: file })
    );
  });
});
