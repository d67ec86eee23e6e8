import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { ConfigSchema, formatZodError } from "../../adapters/validation.js";
import type { Config } from "../../core/domain/entities/config.entity.js";
import { ConfigError, errorMessage } from "../../core/domain/errors.js";

/** `CONFIG_PATH`, else `config/config.yaml` under the working directory. */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.CONFIG_PATH || resolve(process.cwd(), "config", "config.yaml");
}

/**
 * Reads the YAML config, fills `${VAR}` references from the environment and
 * validates the result. Expects `.env` to be loaded already.
 */
export class ConfigService {
  private config: Config;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfig(configPath || resolveConfigPath(env), env);
  }

  static load(configPath?: string): Config {
    return new ConfigService(configPath).getConfig();
  }

  private loadConfig(path: string, env: NodeJS.ProcessEnv): Config {
    if (!existsSync(path)) {
      throw new ConfigError(`Config file not found: ${path}`);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(readFileSync(path, "utf-8"));
    } catch (e) {
      throw new ConfigError(`Could not parse ${path}: ${errorMessage(e)}`);
    }

    const result = ConfigSchema.safeParse(substituteEnv(parsed, env));
    if (!result.success) {
      throw new ConfigError(`Invalid config ${path}: ${formatZodError(result.error)}`);
    }
    return result.data;
  }

  getConfig(): Config {
    return this.config;
  }
}

const ENV_REF = /\$\{([A-Z0-9_]+)\}/g;

/** Replaces `${VAR}` references inside string values; unset variables become "". */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_REF, (_, key: string) => env[key] ?? "");
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}
