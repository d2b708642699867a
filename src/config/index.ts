/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  type EnvSource,
} from "./env.js";
import { AppConfigSchema, type AppConfig } from "./schema.js";

export { ConfigError, type ConfigIssue, type EnvSource } from "./env.js";
export { AppConfigSchema, LogLevelSchema, RuntimeEnv, type AppConfig } from "./schema.js";

/** Values that override the environment (command-line flags). */
export type ConfigOverrides = Partial<Pick<AppConfig, "storeFile" | "exportFile" | "reportFile">>;

/**
 * Load and validate application configuration.
 * Fails fast with a ConfigError listing every invalid key.
 */
export function loadConfig(
  env: EnvSource = process.env,
  overrides: ConfigOverrides = {}
): Readonly<AppConfig> {
  const raw = {
    env: optionalEnv(env, "NODE_ENV", "development"),
    logLevel: optionalEnv(env, "LOG_LEVEL", "info"),
    appName: optionalEnv(env, "APP_NAME", "student-roster"),
    storeFile: optionalEnv(env, "STUDENTS_FILE", "students.csv"),
    exportFile: optionalEnv(env, "STUDENTS_EXPORT_FILE", "students_export.csv"),
    reportFile: optionalEnv(env, "STUDENTS_REPORT_FILE", "students_report.pdf"),
    logDir: optionalEnv(env, "LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool(env, "LOG_TO_FILE", true),
    logToConsole: optionalEnvBool(env, "LOG_CONSOLE", false),
    ...definedOnly(overrides),
  };

  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      key: issue.path.length > 0 ? issue.path.join(".") : "(root)",
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return Object.freeze(result.data);
}

function definedOnly(overrides: ConfigOverrides): ConfigOverrides {
  const out: ConfigOverrides = {};
  if (overrides.storeFile !== undefined) out.storeFile = overrides.storeFile;
  if (overrides.exportFile !== undefined) out.exportFile = overrides.exportFile;
  if (overrides.reportFile !== undefined) out.reportFile = overrides.reportFile;
  return out;
}
