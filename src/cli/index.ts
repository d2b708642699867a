/**
 * Interactive shell.
 */

export { runShell, type ShellOptions, type ShellExit } from "./shell.js";
export { createReadlinePrompter, InputClosedError, type Prompter } from "./prompter.js";
export { MENU, MESSAGES, PROMPTS, formatTable, formatRow, formatStatistics } from "./messages.js";
