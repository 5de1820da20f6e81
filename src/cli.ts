#!/usr/bin/env node
// src/cli.ts
import { readFileSync } from "node:fs";
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import { loadSettings, type Settings } from "./config.js";
import { CLI_NAME } from "./constants.js";
import { errorMessage } from "./errors.js";
import { Ledger } from "./ledger.js";
import { formatHistoryTable, formatPendingTable } from "./ledger-report.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  fileSink,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import { formatSummaryTable } from "./summary.js";
import { EXIT_FAILED, runTransferWorkflow } from "./workflow.js";

type GlobalOpts = {
  config?: string;
  logLevel?: string;
};

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    const parsed = z.object({ version: z.string() }).safeParse(raw);
    return parsed.success ? parsed.data.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return n;
}

function settingsFor(command: Command): Settings {
  const globals = command.optsWithGlobals<GlobalOpts>();
  return loadSettings(globals.config).settings;
}

function loggerFor(command: Command, settings: Settings): Logger {
  const globals = command.optsWithGlobals<GlobalOpts>();
  const level = parseLogLevel(globals.logLevel, settings.logging.level);
  const file = settings.logging.file;
  // a path without an extension is a directory of daily logs
  const sink = file
    ? fileSink(file, { daily: path.extname(file) === "" })
    : undefined;
  return new ConsoleLogger(level, sink);
}

function openLedger(settings: Settings, logger?: Logger): Ledger {
  return Ledger.open(settings.paths.ledger, {
    format: settings.ledger.format,
    logger,
  });
}

function fail(err: unknown): void {
  console.error(`${CLI_NAME}: ${errorMessage(err)}`);
  process.exitCode = EXIT_FAILED;
}

export function buildProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Copy approved batch folders to the destination share, with a transfer ledger",
    )
    .version(readVersion())
    .option("-c, --config <file>", "path to settings.json")
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
    );

  program
    .command("run")
    .description("transfer every selected batch that is new or changed")
    .option("--dry-run", "classify and report without copying", false)
    .action(async (opts: { dryRun: boolean }, command: Command) => {
      let settings: Settings;
      try {
        settings = settingsFor(command);
      } catch (err) {
        fail(err);
        return;
      }
      const logger = loggerFor(command, settings);
      const ac = new AbortController();
      const onSignal = (signal: NodeJS.Signals) => {
        logger.warn("stopping after in-flight files", { signal });
        ac.abort(new Error(`received ${signal}`));
      };
      process.once("SIGINT", onSignal);
      process.once("SIGTERM", onSignal);
      try {
        const { exitCode, summary } = await runTransferWorkflow(
          settings,
          { logger },
          { signal: ac.signal, dryRun: opts.dryRun },
        );
        if (summary) process.stdout.write(formatSummaryTable(summary));
        process.exitCode = exitCode;
      } finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
      }
    });

  program
    .command("status")
    .description("show ledger history")
    .option("-b, --batch <id>", "only this batch")
    .option("-n, --limit <n>", "most recent records", positiveInt, 50)
    .option("--json", "emit JSON", false)
    .action((opts: { batch?: string; limit: number; json: boolean }, command: Command) => {
      try {
        const ledger = openLedger(settingsFor(command));
        try {
          const rows = ledger.history({ batchId: opts.batch, limit: opts.limit });
          if (opts.json) {
            console.log(JSON.stringify(rows, null, 2));
          } else if (!rows.length) {
            console.log("no ledger records");
          } else {
            console.log(formatHistoryTable(rows));
          }
        } finally {
          ledger.close();
        }
      } catch (err) {
        fail(err);
      }
    });

  program
    .command("pending")
    .description("list transfers that were interrupted and will be resumed")
    .action((_opts: Record<string, never>, command: Command) => {
      try {
        const ledger = openLedger(settingsFor(command));
        try {
          const pending = ledger.pendingIncomplete();
          console.log(
            pending.length ? formatPendingTable(pending) : "nothing pending",
          );
        } finally {
          ledger.close();
        }
      } catch (err) {
        fail(err);
      }
    });

  program
    .command("prune")
    .description("drop finished ledger history older than the retention window")
    .option("-d, --days <n>", "retention in days (default from settings)", positiveInt)
    .action((opts: { days?: number }, command: Command) => {
      try {
        const settings = settingsFor(command);
        const logger = loggerFor(command, settings);
        const days = opts.days ?? settings.ledger.retentionDays;
        const ledger = openLedger(settings, logger.child("ledger"));
        try {
          const removed = ledger.prune(Date.now() - days * 24 * 60 * 60 * 1000);
          console.log(`removed ${removed} ledger records older than ${days} days`);
        } finally {
          ledger.close();
        }
      } catch (err) {
        fail(err);
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      fail(err);
    });
}
