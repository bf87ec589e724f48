import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import JSZip from "jszip";

export const WORD_NAMESPACE = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";

export type RunSpec = {
  text: string;
  bold?: boolean;
  italic?: boolean;
};

export type ParagraphSpec = {
  runs: RunSpec[];
  style?: string;
  // Appended after the runs as is.
  rawXml?: string;
};

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function runXml(run: RunSpec): string {
  const props = [run.bold ? "<w:b/>" : "", run.italic ? "<w:i/>" : ""].join("");
  const rPr = props ? `<w:rPr>${props}</w:rPr>` : "";
  const space = /^\s|\s$/.test(run.text) ? ' xml:space="preserve"' : "";
  return `<w:r>${rPr}<w:t${space}>${escapeXml(run.text)}</w:t></w:r>`;
}

export function paragraphXml(paragraph: ParagraphSpec): string {
  if (paragraph.runs.length === 0 && !paragraph.style && !paragraph.rawXml) {
    return "<w:p/>";
  }
  const pPr = paragraph.style ? `<w:pPr><w:pStyle w:val="${paragraph.style}"/></w:pPr>` : "";
  return `<w:p>${pPr}${paragraph.runs.map(runXml).join("")}${paragraph.rawXml ?? ""}</w:p>`;
}

export function partXml(root: "document" | "hdr", paragraphs: ParagraphSpec[]): string {
  const body = paragraphs.map(paragraphXml).join("");
  const inner = root === "document" ? `<w:body>${body}</w:body>` : body;
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><w:${root} xmlns:w="${WORD_NAMESPACE}">${inner}</w:${root}>`;
}

export async function buildDocx(
  paragraphs: ParagraphSpec[],
  extraParts: Record<string, string> = {}
): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    "[Content_Types].xml",
    '<?xml version="1.0" encoding="UTF-8"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"/>'
  );
  zip.file("word/document.xml", partXml("document", paragraphs));
  for (const [partPath, xml] of Object.entries(extraParts)) {
    zip.file(partPath, xml);
  }
  return zip.generateAsync({ type: "nodebuffer" });
}

export async function readDocxPart(filePath: string, partPath = "word/document.xml"): Promise<string> {
  const zip = await JSZip.loadAsync(await fs.readFile(filePath));
  const file = zip.file(partPath);
  if (!file) {
    throw new Error(`${filePath} has no ${partPath}`);
  }
  return file.async("text");
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "doc-humanize-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
