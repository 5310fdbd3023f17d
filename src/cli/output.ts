/*
Purpose: shared CLI plumbing: global flags, the optional JSONL logger, and error printing.
Assumptions: commands never call process.exit; failures set process.exitCode instead.
Usage: await runCliAction(command, async (ctx) => { ... }).
*/

import type { Command } from "commander";

import { createAnsiFormatter, formatErrorLines, resolveColorEnabled } from "../core/error-format.js";
import { JsonlLogger } from "../core/logger.js";

export type GlobalFlags = {
  log?: string;
  debug?: boolean;
};

export type CliContext = {
  logger?: JsonlLogger;
  debug: boolean;
};

export function resolveCliContext(command: Command, env: NodeJS.ProcessEnv = process.env): CliContext {
  const flags = command.optsWithGlobals<GlobalFlags>();
  const logPath = flags.log ?? env.PKGID_LOG_FILE;

  return {
    logger: logPath ? new JsonlLogger(logPath, { command: command.name() }) : undefined,
    debug: resolveDebug(command, env),
  };
}

export function resolveDebug(command: Command, env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(command.optsWithGlobals<GlobalFlags>().debug) || env.PKGID_DEBUG === "1";
}

export async function runCliAction(
  command: Command,
  action: (ctx: CliContext) => Promise<void> | void,
): Promise<void> {
  try {
    // Logger creation can throw.
    await action(resolveCliContext(command));
  } catch (error) {
    printError(error, resolveDebug(command));
    process.exitCode = 1;
  }
}

export function printError(error: unknown, debug: boolean): void {
  const format = createAnsiFormatter(resolveColorEnabled({ stream: process.stderr }));

  for (const line of formatErrorLines(error, { mode: debug ? "debug" : "short" })) {
    if (line.kind === "title") {
      console.error(format(line.text, ["bold", "red"]));
    } else if (line.kind === "hint" || line.kind === "next") {
      console.error(format(`${line.kind === "hint" ? "Hint" : "Next"}: ${line.text}`, ["dim"]));
    } else {
      console.error(line.text);
    }
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
