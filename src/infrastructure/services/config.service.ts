import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { load as loadYaml } from "js-yaml";
import { config as loadEnv } from "dotenv";
import type { Config } from "../../core/domain/entities/config.entity.js";
import { ConfigError, errorMessage } from "../../core/domain/errors.js";
import { ConfigSchema } from "../../adapters/validation.js";

export function defaultConfigPath(cwd: string = process.cwd()): string {
  return resolve(cwd, "config", "config.yaml");
}

export class ConfigService {
  private config: Config;

  /**
   * Resolution order: explicit path, CONFIG_PATH, config/config.yaml.
   * Only the default location may be absent, in which case built-in defaults
   * apply.
   */
  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    loadEnv();
    const explicitPath = configPath || env.CONFIG_PATH;
    const resolvedPath = explicitPath ? resolve(explicitPath) : defaultConfigPath();
    this.config = this.loadConfig(resolvedPath, !explicitPath, env);
  }

  private loadConfig(
    path: string,
    optional: boolean,
    env: NodeJS.ProcessEnv,
  ): Config {
    if (optional && !existsSync(path)) return this.validate({}, "(defaults)");

    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      throw new ConfigError(`Failed to load config from ${path}. ${errorMessage(e)}`, {
        cause: e,
      });
    }

    let parsed: unknown;
    try {
      parsed = loadYaml(raw);
    } catch (e) {
      throw new ConfigError(`Invalid YAML in ${path}. ${errorMessage(e)}`, { cause: e });
    }
    if (parsed === undefined || parsed === null) parsed = {};
    if (typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ConfigError(`Config at ${path} must be a YAML object.`);
    }

    return this.validate(substituteEnv(parsed, env), path);
  }

  private validate(value: unknown, source: string): Config {
    const result = ConfigSchema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`Invalid config at ${source}. ${issues}.`);
    }
    return result.data;
  }

  getConfig(): Config {
    return this.config;
  }
}

/** Replaces string values of the form `${VAR}` with the variable's value. */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}
