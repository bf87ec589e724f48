#!/usr/bin/env node
import "dotenv/config";
import path from "node:path";
import { USAGE, CliOptions, parseCliArgs } from "./cliArgs.js";
import { HumanizeConfig, resolveConfig } from "./config.js";
import { CancellationRequestedError, HumanizeError } from "./errors.js";
import { startServer } from "./server.js";
import { checkConnection, createRefiner, listModels } from "./services/aiService.js";
import { writeComparisonReport } from "./services/reportService.js";
import { batchProcess, collectInputFiles, processDocument } from "./services/processService.js";
import { ProcessWarning } from "./types.js";

const EXIT_FAILURE = 1;
const EXIT_CANCELLED = 130;

function createReporter(quiet: boolean) {
  return {
    progress(current: number, total: number, message: string): void {
      if (!quiet) {
        console.log(`[${current}/${total}] ${message}`);
      }
    },
    warning(warning: ProcessWarning, prefix = ""): void {
      console.warn(`Warning: ${prefix}${warning.message}`);
    }
  };
}

function watchForInterrupt(): AbortController {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("\nInterrupted. Stopping after the current batch...");
    controller.abort();
  });
  return controller;
}

async function runReport(inputPath: string, outputPath: string): Promise<void> {
  const report = await writeComparisonReport(inputPath, outputPath);
  console.log(
    `Report: ${report.reportPath} (${report.stats.wordsAdded} words added, ${report.stats.wordsRemoved} removed, ${report.stats.wordsUnchanged} unchanged)`
  );
}

async function runSingle(options: CliOptions, config: HumanizeConfig, inputPath: string): Promise<number> {
  const reporter = createReporter(options.quiet);
  const controller = watchForInterrupt();
  const refine = createRefiner(config.rewrite, {
    onChunk: options.stream ? (chunk) => process.stdout.write(chunk) : undefined
  });

  console.log(`Reading document: ${inputPath}`);
  const summary = await processDocument({
    inputPath,
    outputPath: options.output,
    config,
    refine,
    signal: controller.signal,
    onProgress: (current, total, message) => {
      if (options.stream) {
        process.stdout.write("\n");
      }
      reporter.progress(current, total, message);
    },
    onWarning: (warning) => reporter.warning(warning)
  });

  console.log(`Saved edited document: ${summary.outputPath}`);
  console.log(
    `Done! Refined ${summary.batchesRefined}/${summary.batchesTotal} batches (${summary.unitsRefined} units), ${summary.batchesSkipped} skipped.`
  );
  if (options.report) {
    await runReport(inputPath, summary.outputPath);
  }
  return 0;
}

async function runBatch(options: CliOptions, config: HumanizeConfig, directory: string): Promise<number> {
  const reporter = createReporter(options.quiet);
  const inputs = await collectInputFiles(directory);
  if (inputs.length === 0) {
    console.log(`No supported files found in ${directory}`);
    return 0;
  }

  const controller = watchForInterrupt();
  console.log(`Processing ${inputs.length} files with ${options.threads} at a time...`);
  const report = await batchProcess({
    inputs,
    outputDir: options.outputDir,
    config,
    concurrency: options.threads,
    signal: controller.signal,
    onProgress: (current, total, message) => reporter.progress(current, total, message),
    onFileProgress: (inputPath, current, total, message) =>
      reporter.progress(current, total, `${path.basename(inputPath)}: ${message}`),
    onWarning: (inputPath, warning) => reporter.warning(warning, `${path.basename(inputPath)}: `)
  });

  for (const outcome of report.outcomes) {
    const name = path.basename(outcome.inputPath);
    if (outcome.status === "succeeded") {
      console.log(`  ok        ${name} -> ${outcome.outputPath}`);
      if (options.report) {
        await runReport(outcome.inputPath, outcome.outputPath);
      }
    } else if (outcome.status === "failed") {
      console.log(`  failed    ${name}: ${outcome.error.message}`);
    } else {
      console.log(`  cancelled ${name}`);
    }
  }

  console.log(
    `Batch processing complete! Processed ${report.filesProcessed}/${inputs.length} files, ${report.filesFailed} failed, ${report.batchesSkipped} batches skipped.`
  );
  if (report.filesCancelled > 0) {
    return EXIT_CANCELLED;
  }
  return report.filesFailed > 0 ? EXIT_FAILURE : 0;
}

async function main(): Promise<number | undefined> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.command === "help") {
    console.log(USAGE);
    return 0;
  }

  const config = resolveConfig(options.overrides);

  switch (options.command) {
    case "serve":
      startServer(config, options.port ?? Number(process.env.PORT || 8080));
      return undefined;
    case "list-models": {
      const listing = await listModels(config.rewrite);
      listing.models.forEach((model) => console.log(model.label ? `${model.id}\t${model.label}` : model.id));
      return 0;
    }
    case "check": {
      const status = await checkConnection(config.rewrite);
      if (!status.reachable) {
        console.error(`Cannot reach ${config.rewrite.provider}: ${status.error ?? "unknown error"}`);
        return EXIT_FAILURE;
      }
      console.log(
        `${config.rewrite.provider} is reachable; model ${config.rewrite.model} ${status.modelAvailable ? "is" : "is not"} available.`
      );
      return 0;
    }
    case "batch":
      return runBatch(options, config, options.batchDir ?? "");
    case "process":
      return runSingle(options, config, options.input ?? "");
  }
}

main().then(
  (code) => {
    if (code !== undefined) {
      process.exitCode = code;
    }
  },
  (error: unknown) => {
    if (error instanceof CancellationRequestedError) {
      console.error("Cancelled. No output was written.");
      process.exitCode = EXIT_CANCELLED;
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(error instanceof HumanizeError ? `Error [${error.code}]: ${message}` : `Error: ${message}`);
    process.exitCode = EXIT_FAILURE;
  }
);
