import { promises as fs } from "node:fs";
import { fileURLToPath } from "node:url";
import { RewriteConfig } from "../config.js";
import { InvalidConfigError } from "../errors.js";

export const BUNDLED_PROMPT_FILE = fileURLToPath(new URL("../../prompts/humanizer.txt", import.meta.url));

const FALLBACK_PROMPT = [
  "Rewrite the following text to make it sound more natural and human-like.",
  "Keep the same meaning and key information, but vary the sentence structure,",
  "use more casual language where appropriate, and make it feel like a person wrote it naturally.",
  "Do not add any preamble or explanation, just provide the rewritten text."
].join("\n");

export type PromptMessages = {
  system: string;
  user: string;
};

async function readPromptFile(filePath: string): Promise<string | undefined> {
  try {
    const text = (await fs.readFile(filePath, "utf8")).trim();
    return text || undefined;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

/**
 * Resolves the base instruction: an explicit system prompt wins, then the
 * configured prompt file, then the bundled humanizer prompt.
 */
export async function loadBasePrompt(config: Pick<RewriteConfig, "systemPrompt" | "promptFile">): Promise<string> {
  if (config.systemPrompt?.trim()) {
    return config.systemPrompt.trim();
  }

  if (config.promptFile) {
    const fromFile = await readPromptFile(config.promptFile);
    if (!fromFile) {
      throw new InvalidConfigError(`Prompt file ${config.promptFile} is missing or empty.`);
    }
    return fromFile;
  }

  return (await readPromptFile(BUNDLED_PROMPT_FILE)) ?? FALLBACK_PROMPT;
}

export function buildSystemInstruction(
  basePrompt: string,
  config: Pick<RewriteConfig, "tone" | "formality">
): string {
  const lines = [basePrompt];
  if (config.tone) {
    lines.push(`Write in a ${config.tone} tone.`);
  }
  if (config.formality) {
    lines.push(`Keep the register ${config.formality}.`);
  }
  return lines.join("\n");
}

export function buildUserMessage(text: string, paragraphCount = 1): string {
  if (paragraphCount <= 1) {
    return `Rewrite this text:\n\n${text}`;
  }
  return [
    `The text below has ${paragraphCount} paragraphs separated by blank lines.`,
    `Return exactly ${paragraphCount} rewritten paragraphs in the same order, separated by blank lines.`,
    "",
    "Rewrite this text:",
    "",
    text
  ].join("\n");
}

export function buildPromptMessages(args: {
  basePrompt: string;
  config: Pick<RewriteConfig, "tone" | "formality">;
  text: string;
  paragraphCount?: number;
}): PromptMessages {
  return {
    system: buildSystemInstruction(args.basePrompt, args.config),
    user: buildUserMessage(args.text, args.paragraphCount)
  };
}

export function flattenPrompt(messages: PromptMessages): string {
  return `${messages.system}\n\n${messages.user}\n\nRewritten text:`;
}
