import type { Config } from "../../core/domain/entities/config.entity.js";
import { ConfigService, defaultConfigPath } from "../services/config.service.js";

/**
 * Loads and validates the application configuration. Without a path the
 * default location is optional and built-in defaults apply when it is absent.
 */
export function loadConfig(path?: string): Config {
  return new ConfigService(path).getConfig();
}

/** Config path shown in CLI help. */
export function getConfigPath(): string {
  return process.env.CONFIG_PATH || defaultConfigPath();
}
