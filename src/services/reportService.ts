import { promises as fs } from "node:fs";
import mammoth from "mammoth";
import { diffWords } from "diff";
import { DocumentIOError } from "../errors.js";
import { detectFormat } from "./documentService.js";

export type DiffStats = {
  wordsAdded: number;
  wordsRemoved: number;
  wordsUnchanged: number;
};

export type ComparisonReport = {
  originalPath: string;
  refinedPath: string;
  stats: DiffStats;
  html: string;
};

function countWords(text: string): number {
  const matches = text.match(/\S+/g);
  return matches ? matches.length : 0;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

export async function extractComparableText(filePath: string): Promise<string> {
  try {
    if (detectFormat(filePath) === "docx") {
      const result = await mammoth.extractRawText({ path: filePath });
      return result.value;
    }
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new DocumentIOError(`Failed to read ${filePath} for comparison.`, error);
  }
}

export function buildDiffHtml(originalText: string, proposedText: string): string {
  const parts = diffWords(originalText, proposedText);
  return parts
    .map((part) => {
      const safeValue = escapeHtml(part.value);
      if (part.added) {
        return `<span class="diff-added">${safeValue}</span>`;
      }
      if (part.removed) {
        return `<span class="diff-removed">${safeValue}</span>`;
      }
      return `<span>${safeValue}</span>`;
    })
    .join("");
}

export function diffStats(originalText: string, refinedText: string): DiffStats {
  const stats: DiffStats = { wordsAdded: 0, wordsRemoved: 0, wordsUnchanged: 0 };
  for (const part of diffWords(originalText, refinedText)) {
    const words = countWords(part.value);
    if (part.added) {
      stats.wordsAdded += words;
    } else if (part.removed) {
      stats.wordsRemoved += words;
    } else {
      stats.wordsUnchanged += words;
    }
  }
  return stats;
}

function renderPage(report: Omit<ComparisonReport, "html">, body: string): string {
  return [
    "<!doctype html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(report.refinedPath)}</title>`,
    "<style>",
    "body { font-family: Georgia, serif; max-width: 46rem; margin: 2rem auto; line-height: 1.6; white-space: pre-wrap; }",
    ".diff-added { background: #d7f5dd; }",
    ".diff-removed { background: #f9d6d5; text-decoration: line-through; }",
    "</style>",
    "</head>",
    "<body>",
    `<p><strong>${report.stats.wordsAdded}</strong> words added, <strong>${report.stats.wordsRemoved}</strong> removed, <strong>${report.stats.wordsUnchanged}</strong> unchanged.</p>`,
    body,
    "</body>",
    "</html>"
  ].join("\n");
}

export async function buildComparisonReport(originalPath: string, refinedPath: string): Promise<ComparisonReport> {
  const [originalText, refinedText] = await Promise.all([
    extractComparableText(originalPath),
    extractComparableText(refinedPath)
  ]);
  const stats = diffStats(originalText, refinedText);
  const html = renderPage({ originalPath, refinedPath, stats }, buildDiffHtml(originalText, refinedText));
  return { originalPath, refinedPath, stats, html };
}

export function reportPathFor(outputPath: string): string {
  return `${outputPath}.diff.html`;
}

export async function writeComparisonReport(originalPath: string, refinedPath: string): Promise<ComparisonReport & { reportPath: string }> {
  const report = await buildComparisonReport(originalPath, refinedPath);
  const reportPath = reportPathFor(refinedPath);
  try {
    await fs.writeFile(reportPath, report.html, "utf8");
  } catch (error) {
    throw new DocumentIOError(`Failed to write ${reportPath}.`, error);
  }
  return { ...report, reportPath };
}
