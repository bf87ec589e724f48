import type { ErrorInfo } from "./errors.js";

export type DocumentFormat = "text" | "docx";

export type StyleRef =
  | {
      kind: "plain";
      lineIndex: number;
    }
  | {
      kind: "docx";
      partPath: string;
      paragraphIndex: number;
      paragraphStyle?: string;
      runCount: number;
    };

export type DocumentUnit = {
  readonly id: string;
  readonly index: number;
  readonly text: string;
  readonly refinable: boolean;
  readonly style: Readonly<StyleRef>;
};

export type Batch = {
  id: string;
  index: number;
  units: DocumentUnit[];
  text: string;
  estimatedTokens: number;
  oversized: boolean;
};

export type RefinementResult = {
  batch: Batch;
  text: string;
};

export type ProgressCallback = (current: number, total: number, message: string) => void;

export type WarningKind = "partial-reassembly" | "partial-failure";

export type ProcessWarning = {
  kind: WarningKind;
  batchIndex: number;
  unitIds: string[];
  message: string;
  code?: ErrorInfo["code"];
};

export type ProcessSummary = {
  inputPath: string;
  outputPath: string;
  format: DocumentFormat;
  unitsTotal: number;
  unitsRefined: number;
  batchesTotal: number;
  batchesRefined: number;
  batchesSkipped: number;
  styleFallbacks: number;
  warnings: ProcessWarning[];
};

export type FileOutcome =
  | {
      inputPath: string;
      status: "succeeded";
      outputPath: string;
      summary: ProcessSummary;
    }
  | {
      inputPath: string;
      status: "failed";
      error: ErrorInfo;
    }
  | {
      inputPath: string;
      status: "cancelled";
    };

export type BatchReport = {
  outcomes: FileOutcome[];
  filesProcessed: number;
  filesFailed: number;
  filesCancelled: number;
  batchesSkipped: number;
};
