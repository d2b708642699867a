#!/usr/bin/env node
/**
 * Entry point for the student roster CLI.
 *
 * Usage:
 *   student-roster [options]
 *
 * Options:
 *   --store <path>    Roster CSV file (default: STUDENTS_FILE or students.csv)
 *   --export <path>   CSV export target (default: STUDENTS_EXPORT_FILE or students_export.csv)
 *   --report <path>   PDF report target (default: STUDENTS_REPORT_FILE or students_report.pdf)
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - Session ended normally (Exit, Ctrl-C or end of input)
 *   1 - Invalid configuration or arguments, or unrecoverable error
 */

import { parseArgs } from "node:util";

import { loadConfig, ConfigError } from "./config/index.js";
import { initRunId, createLogger } from "./logging/index.js";
import { RecordStore } from "./store/index.js";
import { StudentService } from "./students/index.js";
import { createReadlinePrompter, runShell } from "./cli/index.js";

const HELP = `Usage: student-roster [--store <path>] [--export <path>] [--report <path>]

Interactive roster of student records (roll, name, marks) kept in a CSV file.

Options:
  --store <path>    Roster CSV file
  --export <path>   CSV export target
  --report <path>   PDF report target
  -h, --help        Show this help
`;

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      store: { type: "string" },
      export: { type: "string" },
      report: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

async function main(): Promise<number> {
  const args = parseCliArgs();
  if (args.help) {
    process.stdout.write(HELP);
    return 0;
  }

  const runId = initRunId();
  const config = loadConfig(process.env, {
    storeFile: args.store,
    exportFile: args.export,
    reportFile: args.report,
  });

  const logger = createLogger({
    level: config.logLevel,
    logDir: config.logDir,
    file: config.logToFile,
    console: config.logToConsole,
    baseContext: { app: config.appName },
  });
  logger.info("Session starting", { runId, env: config.env, store: config.storeFile });

  const store = new RecordStore(config.storeFile);
  await store.ensureInitialized();

  const exit = await runShell({
    service: new StudentService(store, logger),
    prompter: createReadlinePrompter(),
    output: process.stdout,
    logger,
    exportFile: config.exportFile,
    reportFile: config.reportFile,
  });
  logger.info("Session finished", { exit });
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(err.format());
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exitCode = 1;
  });
