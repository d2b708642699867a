/**
 * Interactive menu loop.
 *
 * Shows the menu, reads a choice, runs the matching StudentService
 * operation and prints its outcome, until the operator exits or input
 * ends. A storage failure ends only the operation that hit it.
 */

import type { Logger } from "../logging/index.js";
import { StorageError } from "../store/record-store.js";
import type { PdfKitLoader } from "../export/index.js";
import type { StudentService } from "../students/service.js";
import { InputClosedError, type Prompter } from "./prompter.js";
import { MENU, MESSAGES, PROMPTS, formatStatistics, formatTable } from "./messages.js";

export interface ShellOptions {
  service: StudentService;
  prompter: Prompter;
  output: NodeJS.WritableStream;
  logger: Logger;
  exportFile: string;
  reportFile: string;
  /** Override how pdfkit is loaded */
  loadPdf?: PdfKitLoader;
}

export type ShellExit = "exit" | "interrupt" | "eof";

type Action = (options: ShellOptions, print: (line: string) => void) => Promise<void>;

const addStudent: Action = async ({ service, prompter }, print) => {
  const outcome = await service.add(async (roll) => {
    print(MESSAGES.generatedRoll(roll));
    const name = await prompter.ask(PROMPTS.name);
    if (name.trim() === "") {
      return { name, marks: "" };
    }
    return { name, marks: await prompter.ask(PROMPTS.marks) };
  });

  if (outcome.status === "invalid") {
    print(outcome.error.hasIssue("name") ? MESSAGES.emptyName : MESSAGES.invalidAddMarks);
    return;
  }
  print(MESSAGES.added(outcome.student.roll));
};

const deleteStudent: Action = async ({ service, prompter }, print) => {
  const roll = await prompter.ask(PROMPTS.deleteRoll);
  const outcome = await service.remove(roll, async (student) => {
    const answer = await prompter.ask(PROMPTS.confirmDelete(student));
    return answer.trim().toLowerCase() === "y";
  });

  switch (outcome.status) {
    case "invalid":
      print(MESSAGES.emptyDeleteRoll);
      break;
    case "not_found":
      print(MESSAGES.notFound(outcome.roll));
      break;
    case "cancelled":
      print(MESSAGES.deleteCancelled);
      break;
    case "removed":
      print(MESSAGES.deleted);
      break;
  }
};

const searchStudents: Action = async ({ service, prompter }, print) => {
  const outcome = await service.search(await prompter.ask(PROMPTS.search));

  switch (outcome.status) {
    case "invalid":
      print(MESSAGES.emptyQuery);
      break;
    case "no_matches":
      print(MESSAGES.noMatches);
      break;
    case "found":
      print(MESSAGES.found(outcome.matches.length));
      formatTable(outcome.matches).forEach(print);
      print("");
      break;
  }
};

const editStudent: Action = async ({ service, prompter }, print) => {
  const roll = await prompter.ask(PROMPTS.editRoll);
  const outcome = await service.edit(roll, async (student) => {
    print(MESSAGES.editing(student));
    const name = await prompter.ask(PROMPTS.newName(student));
    const marks = await prompter.ask(PROMPTS.newMarks(student));
    return { name, marks };
  });

  switch (outcome.status) {
    case "invalid":
      print(outcome.error.hasIssue("roll") ? MESSAGES.emptyEditRoll : MESSAGES.invalidEditMarks);
      break;
    case "not_found":
      print(MESSAGES.notFound(outcome.roll));
      break;
    case "updated":
      print(MESSAGES.updated);
      break;
  }
};

const listStudents: Action = async ({ service }, print) => {
  const outcome = await service.list();
  if (outcome.status === "empty") {
    print(MESSAGES.noRecords);
    return;
  }
  formatTable(outcome.students).forEach(print);
  print(MESSAGES.total(outcome.students.length));
};

const showStatistics: Action = async ({ service }, print) => {
  const outcome = await service.statistics();
  if (outcome.status === "empty") {
    print(MESSAGES.noStatistics);
    return;
  }
  formatStatistics(outcome.statistics).forEach(print);
};

const exportPdf: Action = async ({ service, reportFile, loadPdf }, print) => {
  const outcome = await service.exportReport(reportFile, loadPdf);
  print(outcome.status === "exported" ? MESSAGES.pdfExported(outcome.path) : outcome.reason);
};

const exportCsv: Action = async ({ service, exportFile }, print) => {
  const outcome = await service.exportCsv(exportFile);
  print(outcome.status === "exported" ? MESSAGES.csvExported(outcome.path) : MESSAGES.noExport);
};

const ACTIONS: Readonly<Record<string, Action>> = {
  "1": addStudent,
  "2": deleteStudent,
  "3": searchStudents,
  "4": editStudent,
  "5": listStudents,
  "6": showStatistics,
  "7": exportPdf,
  "8": exportCsv,
};

const EXIT_CHOICE = "9";

/**
 * Run the menu until the operator chooses Exit or input ends.
 */
export async function runShell(options: ShellOptions): Promise<ShellExit> {
  const { prompter, output, logger } = options;
  const print = (line: string): void => {
    output.write(line + "\n");
  };

  try {
    for (;;) {
      output.write(MENU);
      const choice = (await prompter.ask(PROMPTS.choice)).trim();

      if (choice === EXIT_CHOICE) {
        print(MESSAGES.goodbye);
        return "exit";
      }

      const action = ACTIONS[choice];
      if (!action) {
        print(MESSAGES.invalidOption);
        continue;
      }

      try {
        await action(options, print);
      } catch (err) {
        if (!(err instanceof StorageError)) {
          throw err;
        }
        logger.error("Storage failure", { path: err.path, message: err.message });
        print(MESSAGES.storageError(err.message));
      }
    }
  } catch (err) {
    if (err instanceof InputClosedError) {
      print(err.reason === "interrupt" ? MESSAGES.interrupted : MESSAGES.inputClosed);
      logger.info("Session ended", { reason: err.reason });
      return err.reason;
    }
    throw err;
  } finally {
    prompter.close();
  }
}
