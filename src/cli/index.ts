#!/usr/bin/env node
import "dotenv/config";

import {
  parseArgs,
  readPackageVersion,
  runBenchmarkCommand,
  runEvaluate,
  runInit,
  runReceipt,
  runReferences,
  runReport,
  runValidate,
  runVerify,
  type ParsedArgs
} from "./commands.js";
import { getHelpCommand, renderCommandHelp, renderRootHelp } from "./help.js";
import { createStderrFormatter, createStdoutFormatter } from "../ui/fmt.js";

type CommandHandler = (parsed: ParsedArgs) => void | Promise<void>;

const HANDLERS: Record<string, CommandHandler> = {
  init: runInit,
  validate: runValidate,
  run: runBenchmarkCommand,
  references: runReferences,
  evaluate: runEvaluate,
  report: runReport,
  verify: runVerify,
  receipt: runReceipt
};

const main = async (): Promise<void> => {
  const args = process.argv.slice(2);
  const stdoutFmt = createStdoutFormatter();

  if (args.includes("--version")) {
    console.log(readPackageVersion());
    return;
  }

  const [command, ...rest] = args;
  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    const topic = command === "help" ? rest[0] : undefined;
    const entry = topic ? getHelpCommand(topic) : undefined;
    process.stdout.write(entry ? renderCommandHelp(stdoutFmt, entry) : renderRootHelp(stdoutFmt));
    return;
  }

  const handler = HANDLERS[command];
  if (!handler) {
    process.stderr.write(createStderrFormatter().errorBlock(`Unknown command: ${command}`, "Run morpheus-bench --help"));
    process.stderr.write("\n");
    process.exitCode = 1;
    return;
  }

  if (rest.includes("--help") || rest.includes("-h")) {
    const entry = getHelpCommand(command);
    if (entry) {
      process.stdout.write(renderCommandHelp(stdoutFmt, entry));
      return;
    }
  }

  try {
    await handler(parseArgs(rest));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${createStderrFormatter().errorBlock(message)}\n`);
    process.exitCode = 1;
  }
};

void main();
