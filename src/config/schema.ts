/**
 * Application configuration schema.
 *
 * The config is validated once at startup and passed explicitly to the
 * components that need it (store paths, logger settings). Nothing reads
 * file locations from module-level state.
 */

import { z } from "zod";

export const RuntimeEnv = z.enum(["development", "production", "test"]);

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const AppConfigSchema = z
  .object({
    /** Current environment */
    env: RuntimeEnv,
    /** Minimum log level written */
    logLevel: LogLevelSchema,
    /** Application name, used in log context */
    appName: z.string().min(1),

    /** Primary roster file */
    storeFile: z.string().min(1).describe("CSV file holding the roster"),
    /** Secondary CSV written by the export command */
    exportFile: z.string().min(1).describe("CSV snapshot written on export"),
    /** PDF report written by the report command */
    reportFile: z.string().min(1).describe("PDF report path"),

    logDir: z.string().min(1),
    logToFile: z.boolean(),
    /** Off by default: the console is the interactive UI */
    logToConsole: z.boolean(),
  })
  .strict()
  .refine((cfg) => cfg.storeFile !== cfg.exportFile, {
    message: "Export file must differ from the store file",
    path: ["exportFile"],
  });

export type AppConfig = z.infer<typeof AppConfigSchema>;
