import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ForklineConfigSchema, defaultConfig, type ForklineConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const INVALID_CONFIG_HINT = "Fix the config file and rerun, or delete it to use the defaults.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  return { line: error.mark.line + 1, column: error.mark.column + 1 };
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: `Config at ${configPath} is invalid: ${cause.message}`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Loads and validates a config file. A missing file yields the defaults unless
 * the caller asked for this exact file (`required`).
 */
export function loadForklineConfig(
  configPath: string,
  opts: { required?: boolean } = {},
): ForklineConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    if (opts.required) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Config missing.",
        message: `Config not found at ${absolutePath}.`,
        hint: "Check the --config path.",
      });
    }
    return defaultConfig();
  }

  try {
    return parseConfigFile(absolutePath);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw createInvalidConfigError(absolutePath, err);
    }
    throw err;
  }
}

function parseConfigFile(absolutePath: string): ForklineConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const location = resolveYamlErrorLocation(err);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigError(`Invalid YAML${locationDetail}: ${detail}`, err);
  }

  const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });
  const parsed = ForklineConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error.issues), parsed.error);
  }

  return parsed.data;
}
