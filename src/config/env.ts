/**
 * Environment variable loading.
 */

import "dotenv/config";

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Single configuration problem.
 */
export interface ConfigIssue {
  /** Config key or environment variable the issue refers to */
  key: string;
  message: string;
}

export class ConfigError extends Error {
  public readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    const lines = ["Configuration validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.key}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(env: EnvSource, key: string, defaultValue: string): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(env: EnvSource, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`,
    [{ key, message: `not a boolean: ${value}` }]
  );
}
