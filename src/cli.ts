#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { classifyCommand } from "./commands/classify.js";
import { EXIT, exitCodeForError, exitCodeForStatus } from "./commands/exit-codes.js";
import { validateAll } from "./commands/validate.js";
import { formatHumanReport } from "./report/report-builder.js";

type Format = "human" | "jsonl";

function formatOption(): Option {
  return new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

const program = new Command();

program
  .name("pushtriage")
  .description("Classify CI push failures as real regressions, intermittents or unknown")
  .version("0.1.0");

program
  .command("classify")
  .description("Classify the failing test groups of a push snapshot")
  .argument("<snapshot>", "Path to the push snapshot JSON")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config environment overlay (config/<name>.yaml)")
  .option("--no-unknown-from-regressions", "Do not backfill unknown groups that could be regressions")
  .option("--no-children-configs", "Check consistency on this push only, ignoring child pushes")
  .option("--min-configs <n>", "Configurations required for a consistent failure", parsePositiveInt)
  .option("--min-failures <n>", "Failing runs required per configuration", parsePositiveInt)
  .option("--fetch-evidence", "Fetch selection data from the evidence sources when the snapshot has none")
  .option("--out <file>", "Write the JSON report to a file")
  .addOption(formatOption())
  .action(
    async (
      snapshot: string,
      opts: {
        config: string;
        env?: string;
        unknownFromRegressions: boolean;
        childrenConfigs: boolean;
        minConfigs?: number;
        minFailures?: number;
        fetchEvidence?: boolean;
        out?: string;
        format: Format;
      },
    ) => {
      const res = await classifyCommand({
        snapshotPath: snapshot,
        configDir: opts.config,
        envName: opts.env,
        unknownFromRegressions: opts.unknownFromRegressions,
        considerChildrenPushesConfigs: opts.childrenConfigs,
        minConfigs: opts.minConfigs,
        minFailures: opts.minFailures,
        fetchEvidence: opts.fetchEvidence,
        outPath: opts.out,
      });

      if (!res.ok) {
        if (opts.format === "jsonl") {
          process.stdout.write(JSON.stringify({ level: "error", code: res.error.code, message: res.error.message }) + "\n");
        } else {
          console.error(res.error.message);
        }
        process.exit(exitCodeForError(res.error.code));
      }

      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify(res.report) + "\n");
      } else {
        console.log(formatHumanReport(res.report));
        if (res.outPath) console.log(`Report written to ${res.outPath}`);
      }
      process.exit(exitCodeForStatus(res.report.status));
    },
  );

program
  .command("validate")
  .description("Validate the layered config and, optionally, push snapshots")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config environment overlay (config/<name>.yaml)")
  .option("--snapshot <file...>", "Push snapshots to check")
  .addOption(formatOption())
  .action(async (opts: { config: string; env?: string; snapshot?: string[]; format: Format }) => {
    const res = await validateAll({ configDir: opts.config, envName: opts.env, snapshots: opts.snapshot });

    const diagnostics = res.ok ? res.warnings : res.errors;
    if (opts.format === "jsonl") {
      for (const d of diagnostics) process.stdout.write(JSON.stringify(d) + "\n");
    } else {
      for (const d of diagnostics) console.error(d.message);
    }

    if (!res.ok) process.exit(EXIT.INVALID_INPUT);

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.INTERNAL_ERROR);
});
