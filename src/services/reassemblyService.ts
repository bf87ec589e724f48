import { StyleConflictError } from "../errors.js";
import { ProcessWarning, RefinementResult } from "../types.js";
import { LoadedDocument, insertPlainText, replaceText } from "./documentService.js";

export type ReassemblyPlan = {
  texts: string[];
  mode: "exact" | "proportional";
};

export type ReassemblyOutcome = {
  applied: boolean;
  warnings: ProcessWarning[];
  styleFallbacks: number;
};

function splitParagraphs(text: string): string[] {
  return text
    .split(/\n[ \t]*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

/**
 * Spreads the words of `text` over `weights.length` slots in proportion to
 * the weights, keeping word order. Every slot gets at least one word.
 */
export function distributeByLength(text: string, weights: number[]): string[] | null {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const slots = weights.length;
  if (slots === 0 || words.length < slots) {
    return null;
  }

  const total = weights.reduce((sum, weight) => sum + weight, 0);
  const shares = total > 0 ? weights : weights.map(() => 1);
  const shareTotal = total > 0 ? total : slots;

  const texts: string[] = [];
  let start = 0;
  let cumulative = 0;
  for (let index = 0; index < slots; index += 1) {
    cumulative += shares[index];
    let end =
      index === slots - 1 ? words.length : Math.round((words.length * cumulative) / shareTotal);
    end = Math.max(end, start + 1);
    end = Math.min(end, words.length - (slots - 1 - index));
    texts.push(words.slice(start, end).join(" "));
    start = end;
  }
  return texts;
}

/**
 * Maps a batch's refined text back onto its units. Blank-line separated
 * paragraphs map one-to-one when their count matches; otherwise words are
 * redistributed by the original unit lengths.
 */
export function splitRefinedText(refined: string, originalTexts: string[]): ReassemblyPlan | null {
  const paragraphs = splitParagraphs(refined);
  if (paragraphs.length === 0 || originalTexts.length === 0) {
    return null;
  }

  if (originalTexts.length === 1) {
    return { texts: [paragraphs.join(" ")], mode: "exact" };
  }

  if (paragraphs.length === originalTexts.length) {
    return { texts: paragraphs, mode: "exact" };
  }

  const texts = distributeByLength(
    paragraphs.join(" "),
    originalTexts.map((text) => text.length)
  );
  return texts ? { texts, mode: "proportional" } : null;
}

export function applyRefinement(
  document: LoadedDocument,
  result: RefinementResult,
  options: { preserveFormatting: boolean }
): ReassemblyOutcome {
  const { batch } = result;
  const unitIds = batch.units.map((unit) => unit.id);
  const plan = splitRefinedText(
    result.text,
    batch.units.map((unit) => unit.text)
  );

  if (!plan) {
    return {
      applied: false,
      styleFallbacks: 0,
      warnings: [
        {
          kind: "partial-failure",
          batchIndex: batch.index,
          unitIds,
          code: "INVALID_RESPONSE",
          message: `Batch ${batch.index + 1}: refined text could not be mapped onto ${batch.units.length} units; original text kept.`
        }
      ]
    };
  }

  const warnings: ProcessWarning[] = [];
  if (plan.mode === "proportional") {
    warnings.push({
      kind: "partial-reassembly",
      batchIndex: batch.index,
      unitIds,
      message: `Batch ${batch.index + 1}: expected ${batch.units.length} paragraphs from the model, redistributed text by original length.`
    });
  }

  let styleFallbacks = 0;
  batch.units.forEach((unit, index) => {
    const text = plan.texts[index];
    if (!options.preserveFormatting) {
      insertPlainText(document, unit, text, { keepRunStyle: false });
      return;
    }
    try {
      replaceText(document, unit, text);
    } catch (error) {
      if (!(error instanceof StyleConflictError)) {
        throw error;
      }
      insertPlainText(document, unit, text, { keepRunStyle: true });
      styleFallbacks += 1;
    }
  });

  return { applied: true, warnings, styleFallbacks };
}
