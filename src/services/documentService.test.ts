import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DocumentIOError, StyleConflictError, UnsupportedFormatError } from "../errors.js";
import { buildDocx, makeTempDir, partXml, readDocxPart, removeDir } from "../test/fixtures.js";
import {
  deriveOutputPath,
  describeStyle,
  detectFormat,
  distributeTextAcrossRuns,
  insertPlainText,
  loadDocument,
  refinableUnits,
  replaceText,
  saveDocument,
  unitsOf
} from "./documentService.js";

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

async function writeFixture(name: string, data: string | Buffer): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, data);
  return filePath;
}

describe("detectFormat", () => {
  it("recognizes text and docx extensions", () => {
    expect(detectFormat("notes.TXT")).toBe("text");
    expect(detectFormat("readme.md")).toBe("text");
    expect(detectFormat("report.docx")).toBe("docx");
  });

  it("rejects other formats", () => {
    expect(() => detectFormat("slides.pdf")).toThrow(UnsupportedFormatError);
    expect(() => detectFormat("legacy.doc")).toThrow(/save as \.docx/);
  });
});

describe("deriveOutputPath", () => {
  it("adds an _edited suffix beside the input", () => {
    expect(deriveOutputPath(path.join("/tmp", "docs", "report.docx"))).toBe(
      path.join("/tmp", "docs", "report_edited.docx")
    );
  });

  it("places the output in a separate directory when given", () => {
    expect(deriveOutputPath(path.join("/tmp", "docs", "notes.txt"), "/out")).toBe(
      path.join("/out", "notes_edited.txt")
    );
  });
});

describe("distributeTextAcrossRuns", () => {
  it("extends each share to the end of a word", () => {
    expect(distributeTextAcrossRuns([9, 7], "Yearly sales recap")).toEqual(["Yearly sales", " recap"]);
    expect(distributeTextAcrossRuns([5, 4, 6], "Hi there friend")).toEqual(["Hi there", " friend", ""]);
  });

  it("gives everything to a single run", () => {
    expect(distributeTextAcrossRuns([3], "Whole new text")).toEqual(["Whole new text"]);
  });

  it("uses the first run when every run was empty", () => {
    expect(distributeTextAcrossRuns([0, 0], "abc")).toEqual(["abc", ""]);
  });
});

describe("text documents", () => {
  it("loads one unit per line and skips blank lines for refinement", async () => {
    const filePath = await writeFixture("notes.txt", "First line\n\nSecond line\n");
    const document = await loadDocument(filePath);

    expect(document.format).toBe("text");
    expect(unitsOf(document)).toBe(document.units);
    expect(document.units.map((unit) => unit.text)).toEqual(["First line", "", "Second line"]);
    expect(refinableUnits(document).map((unit) => unit.index)).toEqual([0, 2]);
    expect(document.units[2].style).toEqual({ kind: "plain", lineIndex: 2 });
    expect(describeStyle(document.units[2].style)).toBe("line 3");
  });

  it("keeps the byte order mark and line endings on save", async () => {
    const filePath = await writeFixture("crlf.txt", "\uFEFFAlpha\r\nBeta\r\n");
    const document = await loadDocument(filePath);
    replaceText(document, document.units[0], "Gamma");

    const outPath = path.join(dir, "crlf_edited.txt");
    await saveDocument(document, outPath);

    expect(await fs.readFile(outPath, "utf8")).toBe("\uFEFFGamma\r\nBeta\r\n");
    expect(await fs.readFile(filePath, "utf8")).toBe("\uFEFFAlpha\r\nBeta\r\n");
  });

  it("refuses a replacement that spans lines", async () => {
    const filePath = await writeFixture("lines.txt", "Only line");
    const document = await loadDocument(filePath);

    expect(() => replaceText(document, document.units[0], "Two\nlines")).toThrow(StyleConflictError);
    expect(document.units[0].text).toBe("Only line");
  });

  it("joins lines when inserting plain text", async () => {
    const filePath = await writeFixture("plain.txt", "Only line");
    const document = await loadDocument(filePath);
    insertPlainText(document, document.units[0], "Two\nlines", { keepRunStyle: false });

    expect(document.units[0].text).toBe("Two lines");
  });
});

describe("docx documents", () => {
  async function writeReport(): Promise<string> {
    return writeFixture(
      "report.docx",
      await buildDocx([
        { style: "Heading1", runs: [{ text: "Quarterly", bold: true }, { text: " report" }] },
        { runs: [] },
        { runs: [{ text: "Sales grew." }] }
      ])
    );
  }

  it("loads paragraphs with their style references", async () => {
    const document = await loadDocument(await writeReport());

    expect(document.units.map((unit) => unit.text)).toEqual(["Quarterly report", "", "Sales grew."]);
    expect(document.units.map((unit) => unit.refinable)).toEqual([true, false, true]);
    expect(document.units[0].style).toEqual({
      kind: "docx",
      partPath: "word/document.xml",
      paragraphIndex: 0,
      paragraphStyle: "Heading1",
      runCount: 2
    });
    expect(describeStyle(document.units[0].style)).toBe("word/document.xml paragraph 1 (Heading1)");
  });

  it("orders headers after the main document", async () => {
    const filePath = await writeFixture(
      "with-header.docx",
      await buildDocx([{ runs: [{ text: "Body text" }] }], {
        "word/header1.xml": partXml("hdr", [{ runs: [{ text: "Header text" }] }])
      })
    );
    const document = await loadDocument(filePath);

    expect(document.units.map((unit) => unit.text)).toEqual(["Body text", "Header text"]);
    expect(document.units[1].style).toMatchObject({ partPath: "word/header1.xml", paragraphIndex: 0 });
  });

  it("replaces text inside the existing runs", async () => {
    const inputPath = await writeReport();
    const document = await loadDocument(inputPath);
    replaceText(document, document.units[0], "Yearly sales recap");

    const outPath = path.join(dir, "report_edited.docx");
    await saveDocument(document, outPath);

    const xml = await readDocxPart(outPath);
    expect(xml).toContain('<w:pStyle w:val="Heading1"/>');
    expect(xml).toContain("<w:rPr><w:b/></w:rPr><w:t>Yearly sales</w:t>");
    expect(xml).toContain('<w:t xml:space="preserve"> recap</w:t>');

    const reloaded = await loadDocument(outPath);
    expect(reloaded.units.map((unit) => unit.text)).toEqual(["Yearly sales recap", "", "Sales grew."]);
  });

  it("refuses replacements that need new run elements", async () => {
    const document = await loadDocument(await writeReport());

    expect(() => replaceText(document, document.units[0], "Line one\nLine two")).toThrow(StyleConflictError);
    expect(() => replaceText(document, document.units[0], "Name:\tValue")).toThrow(StyleConflictError);
    expect(() => replaceText(document, document.units[1], "Anything")).toThrow(StyleConflictError);
  });

  it("rebuilds a paragraph as one run when inserting plain text", async () => {
    const document = await loadDocument(await writeReport());
    insertPlainText(document, document.units[0], "Line one\nLine two", { keepRunStyle: true });
    expect(document.units[0].text).toBe("Line one Line two");

    const outPath = path.join(dir, "plain.docx");
    await saveDocument(document, outPath);

    const xml = await readDocxPart(outPath);
    expect(xml.match(/<w:r>/g)).toHaveLength(2);
    expect(xml).toContain("<w:br/>");
    expect(xml.match(/<w:b\/>/g)).toHaveLength(1);

    const reloaded = await loadDocument(outPath);
    expect(reloaded.units[0].text).toBe("Line one Line two");
  });

  it("keeps note references and drawings when inserting plain text", async () => {
    const filePath = await writeFixture(
      "chart.docx",
      await buildDocx([
        {
          runs: [{ text: "See the chart" }],
          rawXml: '<w:r><w:footnoteReference w:id="1"/></w:r><w:r><w:drawing/></w:r>'
        }
      ])
    );
    const document = await loadDocument(filePath);
    expect(() => replaceText(document, document.units[0], "Look at\nthe chart")).toThrow(StyleConflictError);

    insertPlainText(document, document.units[0], "Look at\nthe chart", { keepRunStyle: true });
    const outPath = path.join(dir, "chart_edited.docx");
    await saveDocument(document, outPath);

    expect(await readDocxPart(outPath)).toContain(
      '<w:p><w:r><w:t>Look at</w:t><w:br/><w:t>the chart</w:t></w:r>' +
        '<w:r><w:footnoteReference w:id="1"/></w:r><w:r><w:drawing/></w:r></w:p>'
    );
  });

  it("drops run properties unless asked to keep them", async () => {
    const document = await loadDocument(await writeReport());
    insertPlainText(document, document.units[0], "Plain heading", { keepRunStyle: false });

    const outPath = path.join(dir, "unstyled.docx");
    await saveDocument(document, outPath);

    const xml = await readDocxPart(outPath);
    expect(xml).not.toContain("<w:b/>");
    expect(xml).toContain('<w:pStyle w:val="Heading1"/>');
  });

  it("rejects a file that is not a docx archive", async () => {
    const filePath = await writeFixture("broken.docx", "definitely not a zip");
    await expect(loadDocument(filePath)).rejects.toBeInstanceOf(UnsupportedFormatError);
  });
});

describe("loading and saving", () => {
  it("reports unreadable input as an IO error", async () => {
    await expect(loadDocument(path.join(dir, "missing.txt"))).rejects.toBeInstanceOf(DocumentIOError);
  });

  it("rejects unsupported extensions before reading", async () => {
    await expect(loadDocument(path.join(dir, "missing.pdf"))).rejects.toBeInstanceOf(UnsupportedFormatError);
  });

  it("never overwrites the input document", async () => {
    const filePath = await writeFixture("keep.txt", "Original");
    const document = await loadDocument(filePath);
    replaceText(document, document.units[0], "Changed");

    await expect(saveDocument(document, filePath)).rejects.toBeInstanceOf(DocumentIOError);
    expect(await fs.readFile(filePath, "utf8")).toBe("Original");
  });

  it("leaves no temporary files behind", async () => {
    const filePath = await writeFixture("clean.txt", "Original");
    const document = await loadDocument(filePath);
    await saveDocument(document, path.join(dir, "nested", "clean_edited.txt"));

    expect((await fs.readdir(dir)).sort()).toEqual(["clean.txt", "nested"]);
    expect(await fs.readdir(path.join(dir, "nested"))).toEqual(["clean_edited.txt"]);
  });
});
