import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  ConfigService,
  defaultConfigPath,
  substituteEnv,
} from "../src/infrastructure/services/config.service.js";
import { loadConfig } from "../src/infrastructure/utils/config.utils.js";
import { ConfigError } from "../src/core/domain/errors.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "config-"));
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  rmSync(dir, { recursive: true, force: true });
});

function writeConfig(yaml: string): string {
  const path = join(dir, "config.yaml");
  writeFileSync(path, yaml, "utf-8");
  return path;
}

describe("ConfigService", () => {
  it("fills omitted sections with defaults", () => {
    const path = writeConfig("paths:\n  inputDir: shipments\n");

    const config = new ConfigService(path, {}).getConfig();

    expect(config).toEqual({
      paths: {
        inputDir: "shipments",
        templatePath: "output/template.xlsx",
        outputPath: "output/output_filled.xlsx",
      },
      discovery: { extension: ".xlsx", tempFilePrefix: "~" },
      logging: { level: "info", enabled: true, dir: "output/logs", runLog: "consolidate.jsonl" },
      report: { enabled: false, outputDir: "output/reports" },
    });
  });

  it("accepts an empty file", () => {
    const path = writeConfig("");

    expect(new ConfigService(path, {}).getConfig().paths.inputDir).toBe("input");
  });

  it("substitutes ${VAR} values from the environment", () => {
    const path = writeConfig('paths:\n  outputPath: "${OUT_FILE}"\n');

    const service = new ConfigService(path, { OUT_FILE: "out/merged.xlsx" });

    expect(service.getConfig().paths.outputPath).toBe("out/merged.xlsx");
  });

  it("reads the path from CONFIG_PATH", () => {
    const path = writeConfig("logging:\n  level: warn\n");

    expect(new ConfigService(undefined, { CONFIG_PATH: path }).getConfig().logging.level).toBe("warn");
  });

  it("rejects invalid values", () => {
    const path = writeConfig("logging:\n  level: verbose\n");

    expect(() => new ConfigService(path, {})).toThrow(ConfigError);
    expect(() => new ConfigService(path, {})).toThrow(/logging\.level/);
  });

  it("rejects a YAML list", () => {
    const path = writeConfig("- a\n- b\n");

    expect(() => new ConfigService(path, {})).toThrow(`Config at ${path} must be a YAML object.`);
  });

  it("fails for a missing explicit file", () => {
    expect(() => new ConfigService(join(dir, "nope.yaml"), {})).toThrow(/Failed to load config/);
  });

  it("falls back to defaults when config/config.yaml is absent", () => {
    vi.spyOn(process, "cwd").mockReturnValue(dir);

    const config = new ConfigService(undefined, {}).getConfig();

    expect(config.paths.inputDir).toBe("input");
    expect(config.logging.level).toBe("info");
  });

  it("reads config/config.yaml under the working directory", () => {
    mkdirSync(join(dir, "config"));
    writeFileSync(defaultConfigPath(dir), "discovery:\n  extension: .xlsm\n", "utf-8");
    vi.spyOn(process, "cwd").mockReturnValue(dir);

    expect(new ConfigService(undefined, {}).getConfig().discovery.extension).toBe(".xlsm");
  });
});

describe("loadConfig", () => {
  it("uses defaults when no --config is given and the default file is absent", () => {
    vi.spyOn(process, "cwd").mockReturnValue(dir);
    vi.stubEnv("CONFIG_PATH", "");

    expect(loadConfig(undefined).report).toEqual({ enabled: false, outputDir: "output/reports" });
  });
});

describe("substituteEnv", () => {
  it("leaves unknown variables and non-strings untouched", () => {
    expect(substituteEnv({ a: "${MISSING}", b: 3, c: ["${X}"] }, { X: "x" })).toEqual({
      a: "${MISSING}",
      b: 3,
      c: ["x"],
    });
  });
});
