import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveConfig } from "../config.js";
import {
  CancellationRequestedError,
  DocumentIOError,
  InvalidResponseError,
  NothingRefinedError,
  UnreachableError
} from "../errors.js";
import { buildDocx, makeTempDir, readDocxPart, removeDir } from "../test/fixtures.js";
import { RefineFn, createRefiner } from "./aiService.js";
import { loadDocument } from "./documentService.js";
import { batchProcess, collectInputFiles, processDocument } from "./processService.js";

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

async function writeInput(name: string, data: string | Buffer): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, data);
  return filePath;
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { "Content-Type": "application/json" } });
}

describe("processDocument", () => {
  it("rewrites a plain text file into a new file", async () => {
    const inputPath = await writeInput("in.txt", "Hello world.");
    const refine = vi.fn<RefineFn>(async () => "Greetings, world.");
    const onProgress = vi.fn();

    const summary = await processDocument({ inputPath, config: resolveConfig({}, {}), refine, onProgress });

    const outputPath = path.join(dir, "in_edited.txt");
    expect(await fs.readFile(outputPath, "utf8")).toBe("Greetings, world.");
    expect(await fs.readFile(inputPath, "utf8")).toBe("Hello world.");
    expect(refine).toHaveBeenCalledWith("Hello world.", { paragraphCount: 1, batchIndex: 0 });
    expect(onProgress.mock.calls).toEqual([[1, 1, "Batch 1/1 refined (1 unit)"]]);
    expect(summary).toEqual({
      inputPath,
      outputPath,
      format: "text",
      unitsTotal: 1,
      unitsRefined: 1,
      batchesTotal: 1,
      batchesRefined: 1,
      batchesSkipped: 0,
      styleFallbacks: 0,
      warnings: []
    });
  });

  it("keeps the original paragraph when its batch cannot reach the model", async () => {
    const source = await buildDocx([
      { runs: [{ text: "Alpha paragraph text.", bold: true }] },
      { runs: [{ text: "Beta paragraph text." }] },
      { runs: [{ text: "Gamma paragraph text." }] }
    ]);
    const inputPath = await writeInput("report.docx", source);
    const config = resolveConfig({ batchTokens: 6, backoffBaseMs: 0, systemPrompt: "BASE" }, {});
    const fetchMock = vi.fn<typeof fetch>(async (_url, init) => {
      const body = String(init?.body);
      if (body.includes("Beta")) {
        throw new TypeError("fetch failed");
      }
      const word = body.includes("Alpha") ? "Alpha" : "Gamma";
      return jsonResponse({ message: { content: `${word} section text.` } });
    });
    const sleep = vi.fn(async (_ms: number) => {});
    const onProgress = vi.fn();

    const summary = await processDocument({
      inputPath,
      config,
      refine: createRefiner(config.rewrite, { fetch: fetchMock, sleep }),
      onProgress
    });

    expect(fetchMock).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(onProgress.mock.calls).toEqual([
      [1, 3, "Batch 1/3 refined (1 unit)"],
      [2, 3, "Batch 2/3 skipped: UNREACHABLE"],
      [3, 3, "Batch 3/3 refined (1 unit)"]
    ]);
    expect(summary).toMatchObject({ batchesTotal: 3, batchesRefined: 2, batchesSkipped: 1, unitsRefined: 2 });
    expect(summary.warnings).toHaveLength(1);
    expect(summary.warnings[0]).toMatchObject({
      kind: "partial-failure",
      batchIndex: 1,
      code: "UNREACHABLE",
      message: "Batch 2/3: Could not reach http://localhost:11434/api/chat: fetch failed Original text kept."
    });
    expect(summary.warnings[0].unitIds).toHaveLength(1);

    const output = await loadDocument(summary.outputPath);
    expect(output.units.map((unit) => unit.text)).toEqual([
      "Alpha section text.",
      "Beta paragraph text.",
      "Gamma section text."
    ]);
    expect(await readDocxPart(summary.outputPath)).toContain("<w:rPr><w:b/></w:rPr><w:t>Alpha section text.</w:t>");
    expect((await fs.readFile(inputPath)).equals(source)).toBe(true);
  });

  it("leaves a batch untouched when the model answer is unusable", async () => {
    const inputPath = await writeInput("lines.txt", "Keep  me   exactly.\nRefine me.\n");
    const refine = vi
      .fn<RefineFn>()
      .mockRejectedValueOnce(new InvalidResponseError("garbled"))
      .mockResolvedValueOnce("Refined.");

    const summary = await processDocument({ inputPath, config: resolveConfig({ batchTokens: 5 }, {}), refine });

    expect(await fs.readFile(summary.outputPath, "utf8")).toBe("Keep  me   exactly.\nRefined.\n");
    expect(summary.warnings).toHaveLength(1);
    expect(summary.warnings[0]).toMatchObject({ kind: "partial-failure", batchIndex: 0, code: "INVALID_RESPONSE" });
  });

  it("keeps blank lines between refined paragraphs", async () => {
    const inputPath = await writeInput("blank.txt", "One.\n\nTwo.\n");
    const refine = vi.fn<RefineFn>(async () => "Uno.\n\nDos.");

    const summary = await processDocument({ inputPath, config: resolveConfig({}, {}), refine });

    expect(refine).toHaveBeenCalledWith("One.\n\nTwo.", { paragraphCount: 2, batchIndex: 0 });
    expect(await fs.readFile(summary.outputPath, "utf8")).toBe("Uno.\n\nDos.\n");
  });

  it("refines an oversized unit segment by segment", async () => {
    const inputPath = await writeInput("long.txt", "First sentence here. Second sentence here.");
    const refine = vi.fn<RefineFn>(async (text) => text.toUpperCase());

    const summary = await processDocument({ inputPath, config: resolveConfig({ batchTokens: 6 }, {}), refine });

    expect(refine.mock.calls).toEqual([
      ["First sentence here.", { paragraphCount: 1, batchIndex: 0 }],
      ["Second sentence here.", { paragraphCount: 1, batchIndex: 0 }]
    ]);
    expect(await fs.readFile(summary.outputPath, "utf8")).toBe("FIRST SENTENCE HERE. SECOND SENTENCE HERE.");
  });

  it("fails without writing when no batch could be refined", async () => {
    const inputPath = await writeInput("in.txt", "Hello world.");
    const refine = vi.fn<RefineFn>(async () => {
      throw new UnreachableError("down");
    });

    await expect(processDocument({ inputPath, config: resolveConfig({}, {}), refine })).rejects.toBeInstanceOf(
      NothingRefinedError
    );
    expect(await fs.readdir(dir)).toEqual(["in.txt"]);
  });

  it("stops between batches when cancelled", async () => {
    const inputPath = await writeInput("in.txt", "First line here.\nSecond line here.");
    const controller = new AbortController();
    const refine = vi.fn<RefineFn>(async (text) => {
      controller.abort();
      return text;
    });

    await expect(
      processDocument({
        inputPath,
        config: resolveConfig({ batchTokens: 5 }, {}),
        refine,
        signal: controller.signal
      })
    ).rejects.toBeInstanceOf(CancellationRequestedError);
    expect(refine).toHaveBeenCalledTimes(1);
    expect(await fs.readdir(dir)).toEqual(["in.txt"]);
  });

  it("refuses to write over its input", async () => {
    const inputPath = await writeInput("in.txt", "Hello world.");
    const refine = vi.fn<RefineFn>();

    await expect(
      processDocument({ inputPath, outputPath: inputPath, config: resolveConfig({}, {}), refine })
    ).rejects.toBeInstanceOf(DocumentIOError);
    expect(refine).not.toHaveBeenCalled();
  });

  it("copies a document with nothing to refine", async () => {
    const inputPath = await writeInput("empty.txt", "\n\n");
    const refine = vi.fn<RefineFn>();

    const summary = await processDocument({ inputPath, config: resolveConfig({}, {}), refine });

    expect(summary.batchesTotal).toBe(0);
    expect(refine).not.toHaveBeenCalled();
    expect(await fs.readFile(summary.outputPath, "utf8")).toBe("\n\n");
  });
});

describe("batchProcess", () => {
  it("isolates a failing file from the rest", async () => {
    const inputs = [
      await writeInput("a.txt", "First file."),
      path.join(dir, "b.txt"),
      await writeInput("c.txt", "Third file.")
    ];
    const outputDir = path.join(dir, "out");
    const onProgress = vi.fn();

    const report = await batchProcess({
      inputs,
      outputDir,
      config: resolveConfig({}, {}),
      refine: async () => "Refined.",
      onProgress
    });

    expect(report.outcomes.map((outcome) => outcome.status)).toEqual(["succeeded", "failed", "succeeded"]);
    expect(report.outcomes[1]).toEqual({
      inputPath: inputs[1],
      status: "failed",
      error: { code: "IO_ERROR", message: `Failed to read ${inputs[1]}.` }
    });
    expect(report).toMatchObject({ filesProcessed: 2, filesFailed: 1, filesCancelled: 0, batchesSkipped: 0 });
    expect(onProgress.mock.calls).toEqual([
      [1, 3, "a.txt: succeeded"],
      [2, 3, "b.txt: failed"],
      [3, 3, "c.txt: succeeded"]
    ]);
    expect((await fs.readdir(outputDir)).sort()).toEqual(["a_edited.txt", "c_edited.txt"]);
    expect(await fs.readFile(path.join(outputDir, "c_edited.txt"), "utf8")).toBe("Refined.");
  });

  it("keeps input order when running files concurrently", async () => {
    const inputs = await Promise.all(
      ["one.txt", "two.txt", "three.txt"].map((name) => writeInput(name, `Contents of ${name}`))
    );
    const onProgress = vi.fn();

    const report = await batchProcess({
      inputs,
      config: resolveConfig({}, {}),
      concurrency: 2,
      refine: async (text) => text.toUpperCase(),
      onProgress
    });

    expect(report.outcomes.map((outcome) => outcome.inputPath)).toEqual(inputs);
    expect(onProgress.mock.calls.map(([current]) => current)).toEqual([1, 2, 3]);
    expect(await fs.readFile(path.join(dir, "two_edited.txt"), "utf8")).toBe("CONTENTS OF TWO.TXT");
  });

  it("cancels the files that have not started", async () => {
    const inputs = await Promise.all(["a.txt", "b.txt", "c.txt"].map((name) => writeInput(name, "Some text.")));
    const controller = new AbortController();

    const report = await batchProcess({
      inputs,
      config: resolveConfig({}, {}),
      refine: async (text) => text,
      signal: controller.signal,
      onProgress: (current) => {
        if (current === 1) {
          controller.abort();
        }
      }
    });

    expect(report.outcomes.map((outcome) => outcome.status)).toEqual(["succeeded", "cancelled", "cancelled"]);
    expect(report.filesCancelled).toBe(2);
    expect((await fs.readdir(dir)).sort()).toEqual(["a.txt", "a_edited.txt", "b.txt", "c.txt"]);
  });
});

describe("collectInputFiles", () => {
  it("lists supported inputs in natural order", async () => {
    for (const name of ["b.docx", "a10.txt", "a2.txt", "a2_edited.txt", "notes.pdf", "~$b.docx"]) {
      await writeInput(name, "x");
    }
    await fs.mkdir(path.join(dir, "folder.txt"));

    expect(await collectInputFiles(dir)).toEqual([
      path.join(dir, "a2.txt"),
      path.join(dir, "a10.txt"),
      path.join(dir, "b.docx")
    ]);
  });

  it("reports a missing directory as an IO error", async () => {
    await expect(collectInputFiles(path.join(dir, "absent"))).rejects.toBeInstanceOf(DocumentIOError);
  });
});
