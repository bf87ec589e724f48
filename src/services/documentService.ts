import { promises as fs } from "node:fs";
import path from "node:path";
import JSZip from "jszip";
import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { v4 as uuidv4 } from "uuid";
import { DocumentIOError, StyleConflictError, UnsupportedFormatError } from "../errors.js";
import { DocumentFormat, DocumentUnit, StyleRef } from "../types.js";

const EDITABLE_PART_REGEX = /^word\/(document|header\d+|footer\d+|footnotes|endnotes|comments)\.xml$/i;
const MAIN_PART = "word/document.xml";
const WORD_NAMESPACE = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
const WORD_PARAGRAPH_TAG = "w:p";
const WORD_RUN_TAG = "w:r";
const WORD_TEXT_TAG = "w:t";
const PLAIN_RUN_CHILDREN = new Set(["w:rPr", WORD_TEXT_TAG, "w:tab", "w:br", "w:cr"]);
const ILLEGAL_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

const TEXT_EXTENSIONS = new Set([".txt", ".text", ".md", ".markdown"]);
const DOCX_EXTENSIONS = new Set([".docx"]);
export const SUPPORTED_EXTENSIONS = [...TEXT_EXTENSIONS, ...DOCX_EXTENSIONS];

type XmlDocument = ReturnType<DOMParser["parseFromString"]>;
type XmlElement = ReturnType<XmlDocument["createElementNS"]>;

type XmlNode = {
  nodeName: string;
  textContent: string | null;
  firstChild: XmlNode | null;
  nextSibling: XmlNode | null;
};

type XmlNodeList<T> = {
  readonly length: number;
  item: (index: number) => T | null;
};

type MutableUnit = {
  -readonly [K in keyof DocumentUnit]: DocumentUnit[K];
};

type TextBody = {
  kind: "text";
  lineEnding: "\n" | "\r\n";
  bom: boolean;
  trailingNewline: boolean;
};

type DocxBody = {
  kind: "docx";
  zip: JSZip;
  parts: Map<string, XmlDocument>;
  paragraphs: Map<string, { partPath: string; element: XmlElement }>;
  dirtyParts: Set<string>;
};

export type LoadedDocument = {
  readonly path: string;
  readonly format: DocumentFormat;
  readonly units: readonly DocumentUnit[];
  readonly body: TextBody | DocxBody;
  readonly records: Map<string, MutableUnit>;
};

function nodeListToArray<T>(nodeList: XmlNodeList<T>): T[] {
  const out: T[] = [];
  for (let i = 0; i < nodeList.length; i += 1) {
    const item = nodeList.item(i);
    if (item) {
      out.push(item);
    }
  }
  return out;
}

function editablePartPaths(zip: JSZip): string[] {
  const paths = Object.keys(zip.files).filter(
    (partPath) => !zip.files[partPath].dir && EDITABLE_PART_REGEX.test(partPath)
  );
  return paths.sort((left, right) => {
    const rank = (partPath: string): number => {
      if (partPath === MAIN_PART) {
        return 0;
      }
      if (partPath.startsWith("word/header")) {
        return 1;
      }
      if (partPath.startsWith("word/footer")) {
        return 2;
      }
      return 3;
    };
    const leftRank = rank(left);
    const rightRank = rank(right);
    if (leftRank !== rightRank) {
      return leftRank - rightRank;
    }
    return left.localeCompare(right, undefined, { numeric: true, sensitivity: "base" });
  });
}

export function normalizeBlockText(text: string): string {
  return text
    .replace(/\u00a0/g, " ")
    .replace(/\r/g, "")
    .replace(/\n/g, " ")
    .replace(/[ \t]+/g, " ")
    .trim();
}

function collectParagraphText(node: XmlNode, out: string[]): void {
  if (node.nodeName === WORD_TEXT_TAG) {
    out.push(node.textContent ?? "");
    return;
  }
  if (node.nodeName === "w:tab" || node.nodeName === "w:br" || node.nodeName === "w:cr") {
    out.push(" ");
    return;
  }
  for (let child = node.firstChild; child; child = child.nextSibling) {
    collectParagraphText(child, out);
  }
}

function paragraphText(paragraph: XmlNode): string {
  const out: string[] = [];
  collectParagraphText(paragraph, out);
  return normalizeBlockText(out.join(""));
}

// Runs holding drawings, fields or note references are not plain text.
function isPlainTextRun(run: XmlNode): boolean {
  for (let child = run.firstChild; child; child = child.nextSibling) {
    if (!child.nodeName.startsWith("#") && !PLAIN_RUN_CHILDREN.has(child.nodeName)) {
      return false;
    }
  }
  return true;
}

function stripIllegalXmlChars(text: string): string {
  return text.replace(ILLEGAL_XML_CHARS, "");
}

function hasIllegalXmlChars(text: string): boolean {
  return stripIllegalXmlChars(text).length !== text.length;
}

function requiresXmlSpacePreserve(text: string): boolean {
  return /^\s/.test(text) || /\s$/.test(text) || text.includes("  ") || text.includes("\t");
}

function setTextNodeValue(xml: XmlDocument, node: XmlElement, value: string): void {
  while (node.firstChild) {
    node.removeChild(node.firstChild);
  }
  if (value.length > 0) {
    node.appendChild(xml.createTextNode(value));
  }
  if (requiresXmlSpacePreserve(value)) {
    node.setAttribute("xml:space", "preserve");
  } else {
    node.removeAttribute("xml:space");
  }
}

/**
 * Splits a replacement across the runs of a paragraph so each run keeps its
 * own formatting. Every run but the last takes roughly its original share,
 * extended to the end of the word it lands in; the last run takes the rest.
 */
export function distributeTextAcrossRuns(originalLengths: number[], replacement: string): string[] {
  if (originalLengths.length <= 1) {
    return [replacement];
  }

  if (originalLengths.every((length) => length === 0)) {
    const chunks = new Array<string>(originalLengths.length).fill("");
    chunks[0] = replacement;
    return chunks;
  }

  const chunks: string[] = [];
  let cursor = 0;
  for (let index = 0; index < originalLengths.length; index += 1) {
    if (index === originalLengths.length - 1) {
      chunks.push(replacement.slice(cursor));
      break;
    }

    if (cursor >= replacement.length) {
      chunks.push("");
      continue;
    }

    let end = Math.min(cursor + originalLengths[index], replacement.length);
    while (
      end > cursor &&
      end < replacement.length &&
      !/\s/.test(replacement[end - 1]) &&
      !/\s/.test(replacement[end])
    ) {
      end += 1;
    }
    chunks.push(replacement.slice(cursor, end));
    cursor = end;
  }

  return chunks;
}

export function detectFormat(filePath: string): DocumentFormat {
  const extension = path.extname(filePath).toLowerCase();
  if (TEXT_EXTENSIONS.has(extension)) {
    return "text";
  }
  if (DOCX_EXTENSIONS.has(extension)) {
    return "docx";
  }
  if (extension === ".doc") {
    throw new UnsupportedFormatError(`${path.basename(filePath)}: legacy .doc files are not supported, save as .docx first.`);
  }
  throw new UnsupportedFormatError(
    `${path.basename(filePath)}: unsupported format. Expected one of ${SUPPORTED_EXTENSIONS.join(", ")}.`
  );
}

export function deriveOutputPath(inputPath: string, outputDir?: string): string {
  const extension = path.extname(inputPath);
  const name = path.basename(inputPath, extension);
  return path.join(outputDir ?? path.dirname(inputPath), `${name}_edited${extension}`);
}

function loadTextDocument(filePath: string, buffer: Buffer): LoadedDocument {
  let content = buffer.toString("utf8");
  const bom = content.startsWith("\uFEFF");
  if (bom) {
    content = content.slice(1);
  }
  const lineEnding = content.includes("\r\n") ? "\r\n" : "\n";
  const trailingNewline = /\r?\n$/.test(content);
  const lines = (trailingNewline ? content.replace(/\r?\n$/, "") : content).split(/\r?\n/);

  const units = lines.map((line, lineIndex): MutableUnit => ({
    id: uuidv4(),
    index: lineIndex,
    text: line,
    refinable: line.trim().length > 0,
    style: { kind: "plain", lineIndex }
  }));

  return {
    path: filePath,
    format: "text",
    units,
    body: { kind: "text", lineEnding, bom, trailingNewline },
    records: new Map(units.map((unit) => [unit.id, unit]))
  };
}

async function loadDocxDocument(filePath: string, buffer: Buffer): Promise<LoadedDocument> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch {
    throw new UnsupportedFormatError(`${path.basename(filePath)} is not a valid .docx archive.`);
  }
  if (!zip.file(MAIN_PART)) {
    throw new UnsupportedFormatError(`${path.basename(filePath)} has no ${MAIN_PART} part.`);
  }

  const parser = new DOMParser();
  const parts = new Map<string, XmlDocument>();
  const paragraphs: DocxBody["paragraphs"] = new Map();
  const units: MutableUnit[] = [];

  for (const partPath of editablePartPaths(zip)) {
    const file = zip.file(partPath);
    if (!file) {
      continue;
    }

    const xml = await file.async("text");
    let document: XmlDocument;
    try {
      document = parser.parseFromString(xml, "text/xml");
    } catch {
      throw new UnsupportedFormatError(`${path.basename(filePath)}: ${partPath} is not well-formed XML.`);
    }
    if (!document.documentElement) {
      throw new UnsupportedFormatError(`${path.basename(filePath)}: ${partPath} has no root element.`);
    }
    parts.set(partPath, document);

    const partParagraphs = nodeListToArray(document.getElementsByTagName(WORD_PARAGRAPH_TAG));
    partParagraphs.forEach((paragraph, paragraphIndex) => {
      // Text-box hosts carry nested paragraphs; those are units of their own.
      const hostsParagraphs = paragraph.getElementsByTagName(WORD_PARAGRAPH_TAG).length > 0;
      const text = hostsParagraphs ? "" : paragraphText(paragraph);
      const paragraphStyle =
        paragraph.getElementsByTagName("w:pStyle").item(0)?.getAttribute("w:val") ?? undefined;

      const unit: MutableUnit = {
        id: uuidv4(),
        index: units.length,
        text,
        refinable: text.length > 0,
        style: {
          kind: "docx",
          partPath,
          paragraphIndex,
          paragraphStyle,
          runCount: paragraph.getElementsByTagName(WORD_RUN_TAG).length
        }
      };
      units.push(unit);
      paragraphs.set(unit.id, { partPath, element: paragraph });
    });
  }

  return {
    path: filePath,
    format: "docx",
    units,
    body: { kind: "docx", zip, parts, paragraphs, dirtyParts: new Set() },
    records: new Map(units.map((unit) => [unit.id, unit]))
  };
}

export async function loadDocument(filePath: string): Promise<LoadedDocument> {
  const format = detectFormat(filePath);

  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new DocumentIOError(`Failed to read ${filePath}.`, error);
  }

  return format === "docx" ? loadDocxDocument(filePath, buffer) : loadTextDocument(filePath, buffer);
}

export function unitsOf(document: LoadedDocument): readonly DocumentUnit[] {
  return document.units;
}

export function refinableUnits(document: LoadedDocument): DocumentUnit[] {
  return document.units.filter((unit) => unit.refinable);
}

function recordFor(document: LoadedDocument, unit: DocumentUnit): MutableUnit {
  const record = document.records.get(unit.id);
  if (!record) {
    throw new Error(`Unit ${unit.id} does not belong to ${document.path}.`);
  }
  return record;
}

function paragraphFor(body: DocxBody, unit: DocumentUnit): { xml: XmlDocument; partPath: string; element: XmlElement } {
  const binding = body.paragraphs.get(unit.id);
  const xml = binding ? body.parts.get(binding.partPath) : undefined;
  if (!binding || !xml) {
    throw new Error(`Unit ${unit.id} has no paragraph binding.`);
  }
  return { xml, partPath: binding.partPath, element: binding.element };
}

/**
 * Replaces a unit's visible text in place. Runs and their properties are left
 * untouched; only the `w:t` contents change.
 */
export function replaceText(document: LoadedDocument, unit: DocumentUnit, newText: string): void {
  const record = recordFor(document, unit);
  const body = document.body;

  if (body.kind === "text") {
    if (/[\r\n]/.test(newText)) {
      throw new StyleConflictError(`Line ${unit.index + 1}: replacement spans several lines.`);
    }
    record.text = newText;
    return;
  }

  if (/[\r\n\t]/.test(newText)) {
    throw new StyleConflictError(`Paragraph ${unit.index + 1}: line breaks and tabs need their own run elements.`);
  }
  if (hasIllegalXmlChars(newText)) {
    throw new StyleConflictError(`Paragraph ${unit.index + 1}: replacement contains characters XML cannot carry.`);
  }

  const { xml, partPath, element } = paragraphFor(body, unit);
  const textNodes = nodeListToArray(element.getElementsByTagName(WORD_TEXT_TAG));
  if (textNodes.length === 0) {
    throw new StyleConflictError(`Paragraph ${unit.index + 1} has no text runs to carry the replacement.`);
  }

  const chunks = distributeTextAcrossRuns(
    textNodes.map((node) => (node.textContent ?? "").length),
    newText
  );
  textNodes.forEach((node, index) => {
    setTextNodeValue(xml, node, chunks[index] ?? "");
  });
  body.dirtyParts.add(partPath);
  record.text = newText;
}

/**
 * Replaces the text runs of a unit with a single plain run placed where the
 * first of them was. Runs holding anything besides text stay in place. Line
 * breaks become `w:br` and tabs `w:tab`. With `keepRunStyle`, the first text
 * run's properties carry over to the new run.
 */
export function insertPlainText(
  document: LoadedDocument,
  unit: DocumentUnit,
  newText: string,
  options: { keepRunStyle: boolean }
): void {
  const record = recordFor(document, unit);
  const body = document.body;

  if (body.kind === "text") {
    record.text = newText.replace(/\s*\r?\n\s*/g, " ").trim();
    return;
  }

  const { xml, partPath, element } = paragraphFor(body, unit);
  const text = stripIllegalXmlChars(newText.replace(/\u00a0/g, " ").replace(/\r/g, "")).trim();
  const runs = nodeListToArray(element.getElementsByTagName(WORD_RUN_TAG)).filter(isPlainTextRun);
  const anchor: XmlElement | undefined = runs[0];
  const runProperties = options.keepRunStyle ? anchor?.getElementsByTagName("w:rPr").item(0) : null;

  const run = xml.createElementNS(WORD_NAMESPACE, WORD_RUN_TAG);
  if (runProperties) {
    run.appendChild(runProperties.cloneNode(true));
  }

  text.split("\n").forEach((line, lineIndex) => {
    if (lineIndex > 0) {
      run.appendChild(xml.createElementNS(WORD_NAMESPACE, "w:br"));
    }
    line.split("\t").forEach((segment, segmentIndex) => {
      if (segmentIndex > 0) {
        run.appendChild(xml.createElementNS(WORD_NAMESPACE, "w:tab"));
      }
      if (segment.length > 0) {
        const textNode = xml.createElementNS(WORD_NAMESPACE, WORD_TEXT_TAG);
        setTextNodeValue(xml, textNode, segment);
        run.appendChild(textNode);
      }
    });
  });

  const anchorParent = anchor?.parentNode;
  if (anchor && anchorParent) {
    anchorParent.insertBefore(run, anchor);
  } else {
    element.appendChild(run);
  }
  for (const oldRun of runs) {
    oldRun.parentNode?.removeChild(oldRun);
  }
  body.dirtyParts.add(partPath);
  record.text = normalizeBlockText(text);
}

async function writeFileAtomic(outPath: string, data: Buffer | string): Promise<void> {
  const tempPath = `${outPath}.${uuidv4()}.tmp`;
  try {
    await fs.mkdir(path.dirname(outPath), { recursive: true });
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, outPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new DocumentIOError(`Failed to write ${outPath}.`, error);
  }
}

async function serializeDocx(body: DocxBody): Promise<Buffer> {
  const serializer = new XMLSerializer();
  for (const partPath of body.dirtyParts) {
    const xml = body.parts.get(partPath);
    if (xml) {
      body.zip.file(partPath, serializer.serializeToString(xml));
    }
  }
  return body.zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE"
  });
}

function serializeText(document: LoadedDocument, body: TextBody): string {
  const content = document.units.map((unit) => unit.text).join(body.lineEnding);
  return `${body.bom ? "\uFEFF" : ""}${content}${body.trailingNewline ? body.lineEnding : ""}`;
}

export async function saveDocument(document: LoadedDocument, outPath: string): Promise<string> {
  if (path.resolve(outPath) === path.resolve(document.path)) {
    throw new DocumentIOError(`Refusing to overwrite the input document ${document.path}.`);
  }

  const body = document.body;
  const data = body.kind === "docx" ? await serializeDocx(body) : serializeText(document, body);
  await writeFileAtomic(outPath, data);
  return outPath;
}

export function describeStyle(style: Readonly<StyleRef>): string {
  if (style.kind === "plain") {
    return `line ${style.lineIndex + 1}`;
  }
  const label = style.paragraphStyle ? ` (${style.paragraphStyle})` : "";
  return `${style.partPath} paragraph ${style.paragraphIndex + 1}${label}`;
}
