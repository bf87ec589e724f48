import { promises as fs } from "node:fs";
import path from "node:path";
import pLimit from "p-limit";
import { HumanizeConfig } from "../config.js";
import {
  CancellationRequestedError,
  DocumentIOError,
  InvalidConfigError,
  NothingRefinedError,
  toErrorInfo
} from "../errors.js";
import {
  Batch,
  BatchReport,
  FileOutcome,
  ProcessSummary,
  ProcessWarning,
  ProgressCallback
} from "../types.js";
import { RefineFn, createRefiner } from "./aiService.js";
import { chunkUnits, splitOversizedText } from "./chunkService.js";
import {
  SUPPORTED_EXTENSIONS,
  deriveOutputPath,
  loadDocument,
  refinableUnits,
  saveDocument
} from "./documentService.js";
import { applyRefinement } from "./reassemblyService.js";

export type WarningListener = (warning: ProcessWarning) => void;

export type ProcessOptions = {
  inputPath: string;
  outputPath?: string;
  config: HumanizeConfig;
  onProgress?: ProgressCallback;
  onWarning?: WarningListener;
  signal?: AbortSignal;
  refine?: RefineFn;
};

export type BatchProcessOptions = {
  inputs: string[];
  outputDir?: string;
  config: HumanizeConfig;
  concurrency?: number;
  onProgress?: ProgressCallback;
  onFileProgress?: (inputPath: string, current: number, total: number, message: string) => void;
  onWarning?: (inputPath: string, warning: ProcessWarning) => void;
  signal?: AbortSignal;
  refine?: RefineFn;
};

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancellationRequestedError();
  }
}

function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

async function refineBatch(
  batch: Batch,
  refine: RefineFn,
  batchTokens: number,
  signal?: AbortSignal
): Promise<string> {
  if (!batch.oversized) {
    return refine(batch.text, { paragraphCount: batch.units.length, batchIndex: batch.index });
  }

  const refined: string[] = [];
  for (const segment of splitOversizedText(batch.text, batchTokens)) {
    throwIfCancelled(signal);
    refined.push(await refine(segment, { paragraphCount: 1, batchIndex: batch.index }));
  }
  return refined.join(" ");
}

/**
 * Refines one document batch by batch and writes the result to a new file.
 * A failed batch keeps its original text; the call only fails when the
 * document cannot be read or written, when no batch could be refined, or
 * when `signal` is aborted.
 */
export async function processDocument(options: ProcessOptions): Promise<ProcessSummary> {
  const { config, signal } = options;
  const outputPath = options.outputPath ?? deriveOutputPath(options.inputPath);
  if (path.resolve(outputPath) === path.resolve(options.inputPath)) {
    throw new DocumentIOError(`Refusing to overwrite the input document ${options.inputPath}.`);
  }

  const document = await loadDocument(options.inputPath);
  const batches = chunkUnits(refinableUnits(document), config.batchTokens);
  const refine = options.refine ?? createRefiner(config.rewrite);

  const warnings: ProcessWarning[] = [];
  const warn = (warning: ProcessWarning): void => {
    warnings.push(warning);
    options.onWarning?.(warning);
  };

  let batchesRefined = 0;
  let unitsRefined = 0;
  let styleFallbacks = 0;

  for (const batch of batches) {
    throwIfCancelled(signal);
    const label = `Batch ${batch.index + 1}/${batches.length}`;
    let message: string;

    try {
      const text = await refineBatch(batch, refine, config.batchTokens, signal);
      const outcome = applyRefinement(document, { batch, text }, { preserveFormatting: config.preserveFormatting });
      outcome.warnings.forEach(warn);
      styleFallbacks += outcome.styleFallbacks;
      if (outcome.applied) {
        batchesRefined += 1;
        unitsRefined += batch.units.length;
        message = `${label} refined (${pluralize(batch.units.length, "unit")})`;
      } else {
        message = `${label} skipped: INVALID_RESPONSE`;
      }
    } catch (error) {
      if (error instanceof CancellationRequestedError || error instanceof InvalidConfigError) {
        throw error;
      }
      const info = toErrorInfo(error);
      warn({
        kind: "partial-failure",
        batchIndex: batch.index,
        unitIds: batch.units.map((unit) => unit.id),
        code: info.code,
        message: `${label}: ${info.message} Original text kept.`
      });
      message = `${label} skipped: ${info.code}`;
    }

    options.onProgress?.(batch.index + 1, batches.length, message);
  }

  if (batches.length > 0 && batchesRefined === 0) {
    throw new NothingRefinedError(
      `No batch of ${options.inputPath} could be refined (${pluralize(batches.length, "batch")} failed).`
    );
  }

  throwIfCancelled(signal);
  await saveDocument(document, outputPath);

  return {
    inputPath: options.inputPath,
    outputPath,
    format: document.format,
    unitsTotal: document.units.length,
    unitsRefined,
    batchesTotal: batches.length,
    batchesRefined,
    batchesSkipped: batches.length - batchesRefined,
    styleFallbacks,
    warnings
  };
}

/**
 * Runs `processDocument` over several files. Each file is isolated: its
 * failure is recorded in the report and the remaining files still run.
 */
export async function batchProcess(options: BatchProcessOptions): Promise<BatchReport> {
  const { inputs, signal } = options;
  const limit = pLimit(Math.max(1, options.concurrency ?? 1));
  const refine = options.refine ?? createRefiner(options.config.rewrite);
  let completed = 0;

  const runOne = async (inputPath: string): Promise<FileOutcome> => {
    if (signal?.aborted) {
      return { inputPath, status: "cancelled" };
    }

    try {
      const summary = await processDocument({
        inputPath,
        outputPath: deriveOutputPath(inputPath, options.outputDir),
        config: options.config,
        signal,
        refine,
        onProgress: options.onFileProgress
          ? (current, total, message) => options.onFileProgress?.(inputPath, current, total, message)
          : undefined,
        onWarning: options.onWarning ? (warning) => options.onWarning?.(inputPath, warning) : undefined
      });
      return { inputPath, status: "succeeded", outputPath: summary.outputPath, summary };
    } catch (error) {
      if (error instanceof CancellationRequestedError) {
        return { inputPath, status: "cancelled" };
      }
      return { inputPath, status: "failed", error: toErrorInfo(error) };
    }
  };

  const outcomes = await Promise.all(
    inputs.map((inputPath) =>
      limit(async () => {
        const outcome = await runOne(inputPath);
        completed += 1;
        options.onProgress?.(completed, inputs.length, `${path.basename(inputPath)}: ${outcome.status}`);
        return outcome;
      })
    )
  );

  return {
    outcomes,
    filesProcessed: outcomes.filter((outcome) => outcome.status === "succeeded").length,
    filesFailed: outcomes.filter((outcome) => outcome.status === "failed").length,
    filesCancelled: outcomes.filter((outcome) => outcome.status === "cancelled").length,
    batchesSkipped: outcomes.reduce(
      (sum, outcome) => sum + (outcome.status === "succeeded" ? outcome.summary.batchesSkipped : 0),
      0
    )
  };
}

export async function collectInputFiles(
  directory: string,
  extensions: readonly string[] = SUPPORTED_EXTENSIONS
): Promise<string[]> {
  let entries: Array<{ name: string; isFile: () => boolean }>;
  try {
    entries = await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    throw new DocumentIOError(`Failed to read directory ${directory}.`, error);
  }

  const accepted = new Set(extensions.map((extension) => extension.toLowerCase()));
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => accepted.has(path.extname(name).toLowerCase()))
    .filter((name) => !/_edited$/i.test(path.basename(name, path.extname(name))))
    .filter((name) => !name.startsWith("~$"))
    .sort((left, right) => left.localeCompare(right, undefined, { numeric: true, sensitivity: "base" }))
    .map((name) => path.join(directory, name));
}
