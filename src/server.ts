import cors from "cors";
import express, { NextFunction, Request, Response } from "express";
import multer from "multer";
import { promises as fs } from "node:fs";
import type { Server } from "node:http";
import os from "node:os";
import path from "node:path";
import { ZodError, z } from "zod";
import { HumanizeConfig } from "./config.js";
import { HumanizeError, toErrorInfo } from "./errors.js";
import { JobStore, createJobStore, publicJobView } from "./jobStore.js";
import { FetchLike, RefineFn, checkConnection, createRefiner, listModels } from "./services/aiService.js";
import { deriveOutputPath, detectFormat } from "./services/documentService.js";
import { processDocument } from "./services/processService.js";

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export type AppDeps = {
  config: HumanizeConfig;
  jobs?: JobStore;
  refine?: RefineFn;
  fetch?: FetchLike;
};

const humanizeRequestSchema = z.object({
  model: z.string().trim().min(1).optional(),
  temperature: z.coerce.number().min(0).max(1).optional(),
  maxTokens: z.coerce.number().int().positive().optional(),
  batchTokens: z.coerce.number().int().positive().optional(),
  tone: z.string().trim().max(200).optional(),
  formality: z.string().trim().max(200).optional(),
  instructions: z.string().trim().max(4000).optional(),
  preserveFormatting: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional()
});

type HumanizeRequest = z.infer<typeof humanizeRequestSchema>;

function readRouteParam(value: string | string[] | undefined): string {
  if (!value) {
    return "";
  }
  if (Array.isArray(value)) {
    return value[0] || "";
  }
  return value;
}

function applyRequestOverrides(config: HumanizeConfig, request: HumanizeRequest): HumanizeConfig {
  const maxTokens = request.maxTokens ?? config.rewrite.maxTokens;
  return {
    preserveFormatting: request.preserveFormatting ?? config.preserveFormatting,
    batchTokens: request.batchTokens ?? (request.maxTokens ? maxTokens : config.batchTokens),
    rewrite: {
      ...config.rewrite,
      model: request.model ?? config.rewrite.model,
      temperature: request.temperature ?? config.rewrite.temperature,
      maxTokens,
      tone: request.tone || config.rewrite.tone,
      formality: request.formality || config.rewrite.formality,
      systemPrompt: request.instructions || config.rewrite.systemPrompt
    }
  };
}

export function statusForError(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (error instanceof HumanizeError) {
    switch (error.code) {
      case "UNSUPPORTED_FORMAT":
      case "INVALID_CONFIG":
        return 400;
      case "NOTHING_REFINED":
      case "UNREACHABLE":
      case "RATE_LIMITED":
      case "INVALID_RESPONSE":
        return 502;
      default:
        return 500;
    }
  }
  return 500;
}

function errorBody(error: unknown): { error: string; code: string } {
  if (error instanceof ZodError) {
    return {
      error: error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
      code: "INVALID_REQUEST"
    };
  }
  const info = toErrorInfo(error);
  return { error: info.message, code: info.code };
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const jobs = deps.jobs ?? createJobStore();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: 10 * 1024 * 1024 }
  });

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.get("/api/health", async (_req, res) => {
    const status = await checkConnection(deps.config.rewrite, { fetch: deps.fetch });
    return res.json({
      ok: true,
      provider: deps.config.rewrite.provider,
      model: deps.config.rewrite.model,
      endpointUrl: deps.config.rewrite.endpointUrl ?? null,
      ...status
    });
  });

  app.get("/api/models", async (_req, res) => {
    try {
      return res.json(await listModels(deps.config.rewrite, { fetch: deps.fetch }));
    } catch (error) {
      return res.status(statusForError(error)).json(errorBody(error));
    }
  });

  app.post("/api/humanize", upload.single("file"), async (req, res) => {
    let workDir: string | undefined;
    try {
      if (!req.file) {
        return res.status(400).json({ error: "Missing file.", code: "INVALID_REQUEST" });
      }

      const sourceFilename = path.basename(req.file.originalname);
      detectFormat(sourceFilename);
      const config = applyRequestOverrides(deps.config, humanizeRequestSchema.parse(req.body));
      const refine = deps.refine ?? createRefiner(config.rewrite, { fetch: deps.fetch });

      workDir = await fs.mkdtemp(path.join(os.tmpdir(), "doc-humanize-"));
      const inputPath = path.join(workDir, sourceFilename);
      const outputPath = deriveOutputPath(inputPath);
      await fs.writeFile(inputPath, req.file.buffer);

      const job = jobs.createJob({ sourceFilename, outputFilename: path.basename(outputPath) });
      try {
        const summary = await processDocument({
          inputPath,
          outputPath,
          config,
          refine,
          onProgress: (current, total, message) => {
            job.progress.push({ current, total, message, at: new Date().toISOString() });
          },
          onWarning: (warning) => {
            job.warnings.push(warning);
          }
        });
        job.summary = { ...summary, inputPath: job.sourceFilename, outputPath: job.outputFilename };
        job.outputBuffer = await fs.readFile(outputPath);
        job.status = "succeeded";
      } catch (error) {
        job.status = "failed";
        job.error = toErrorInfo(error);
        jobs.updateJob(job);
        return res.status(statusForError(error)).json({ ...errorBody(error), job: publicJobView(job) });
      }

      jobs.updateJob(job);
      return res.json({ job: publicJobView(job) });
    } catch (error) {
      return res.status(statusForError(error)).json(errorBody(error));
    } finally {
      if (workDir) {
        await fs.rm(workDir, { recursive: true, force: true });
      }
    }
  });

  app.get("/api/jobs/:id", (req, res) => {
    const job = jobs.getJob(readRouteParam(req.params.id));
    if (!job) {
      return res.status(404).json({ error: "Job not found.", code: "NOT_FOUND" });
    }
    return res.json({ job: publicJobView(job) });
  });

  app.get("/api/jobs/:id/download", (req, res) => {
    const job = jobs.getJob(readRouteParam(req.params.id));
    if (!job) {
      return res.status(404).json({ error: "Job not found.", code: "NOT_FOUND" });
    }
    if (!job.outputBuffer) {
      return res.status(409).json({ error: "Job has no output document.", code: "NOT_READY" });
    }

    const isDocx = job.outputFilename.toLowerCase().endsWith(".docx");
    res.setHeader("Content-Disposition", `attachment; filename="${job.outputFilename.replace(/"/g, "")}"`);
    res.setHeader("Content-Type", isDocx ? DOCX_MIME : "text/plain; charset=utf-8");
    res.setHeader("Cache-Control", "no-store");
    return res.send(job.outputBuffer);
  });

  app.delete("/api/jobs/:id", (req, res) => {
    const removed = jobs.deleteJob(readRouteParam(req.params.id));
    if (!removed) {
      return res.status(404).json({ error: "Job not found.", code: "NOT_FOUND" });
    }
    return res.json({ ok: true });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not Found", code: "NOT_FOUND" });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      res.status(status).json({ error: error.message, code: "INVALID_REQUEST" });
      return;
    }
    res.status(statusForError(error)).json(errorBody(error));
  });

  return app;
}

export function startServer(config: HumanizeConfig, port: number): Server {
  const app = createApp({ config });
  return app.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`doc-humanize listening on http://localhost:${port} (${config.rewrite.provider}: ${config.rewrite.model})`);
  });
}
