import { ConfigOverrides, PROVIDERS, Provider } from "./config.js";
import { InvalidConfigError } from "./errors.js";

export type CliCommand = "process" | "batch" | "serve" | "list-models" | "check" | "help";

export type CliOptions = {
  command: CliCommand;
  input?: string;
  batchDir?: string;
  output?: string;
  outputDir?: string;
  threads: number;
  report: boolean;
  stream: boolean;
  quiet: boolean;
  port?: number;
  overrides: ConfigOverrides;
};

const VALUE_FLAGS = [
  "--input",
  "-i",
  "--batch-dir",
  "-b",
  "--output",
  "-o",
  "--output-dir",
  "--provider",
  "--model",
  "-m",
  "--url",
  "--api-key",
  "--temperature",
  "-t",
  "--max-tokens",
  "--batch-tokens",
  "--threads",
  "--tone",
  "--formality",
  "--prompt-file",
  "--system-prompt",
  "--timeout",
  "--retries",
  "--port"
];

const SWITCH_FLAGS = [
  "--no-preserve-formatting",
  "--no-chat",
  "--stream",
  "--report",
  "--list-models",
  "--check",
  "--serve",
  "--quiet",
  "-q",
  "--help",
  "-h"
];

export const USAGE = `doc-humanize - rewrite documents through an LLM while keeping their formatting

Usage:
  doc-humanize --input <file> [--output <file>] [options]
  doc-humanize --batch-dir <dir> [--output-dir <dir>] [--threads <n>] [options]
  doc-humanize --serve [--port <n>]
  doc-humanize --list-models | --check

Input:
  -i, --input <file>            .docx, .txt or .md file to rewrite
  -b, --batch-dir <dir>         rewrite every supported file in a directory
  -o, --output <file>           output path (single file mode, default <name>_edited<ext>)
      --output-dir <dir>        output directory (batch mode)

Model:
      --provider <name>         ${PROVIDERS.join(" | ")} (default ollama)
  -m, --model <id>              model identifier
      --url <url>               endpoint URL (default http://localhost:11434 for ollama)
      --api-key <key>           API key for hosted providers
  -t, --temperature <0-1>       output variability (default 0.7)
      --max-tokens <n>          response length ceiling (default 2000)
      --batch-tokens <n>        request budget per batch (default: max tokens)
      --tone <text>             tone directive, e.g. "friendly"
      --formality <text>        formality directive, e.g. "informal"
      --prompt-file <file>      read the base instructions from a file
      --system-prompt <text>    replace the base instructions
      --timeout <ms>            per-request timeout (default 120000)
      --retries <n>             attempts per request (default 3)
      --no-chat                 use the Ollama generate API instead of chat

Processing:
      --threads <n>             files processed at once in batch mode (default 1)
      --no-preserve-formatting  write plain runs without character styles
      --stream                  print model output as it arrives
      --report                  write <output>.diff.html with a word diff
  -q, --quiet                   only print the summary

Other:
      --serve                   start the HTTP API
      --port <n>                HTTP port (default PORT or 8080)
      --list-models             list the provider's models
      --check                   check that the provider is reachable
  -h, --help                    show this help`;

function splitInlineValues(argv: string[]): string[] {
  return argv.flatMap((arg) => {
    const match = arg.match(/^(--[a-z-]+)=(.*)$/);
    return match ? [match[1], match[2]] : [arg];
  });
}

function getArg(argv: string[], ...flags: string[]): string | undefined {
  for (const flag of flags) {
    const idx = argv.indexOf(flag);
    if (idx === -1) {
      continue;
    }
    const value = argv[idx + 1];
    if (value === undefined || (VALUE_FLAGS.includes(value) || SWITCH_FLAGS.includes(value))) {
      throw new InvalidConfigError(`Missing value for ${flag}.`);
    }
    return value;
  }
  return undefined;
}

function hasFlag(argv: string[], ...flags: string[]): boolean {
  return flags.some((flag) => argv.includes(flag));
}

function getNumber(argv: string[], ...flags: string[]): number | undefined {
  const raw = getArg(argv, ...flags);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidConfigError(`${flags[0]} expects a number, got "${raw}".`);
  }
  return value;
}

function assertKnownFlags(argv: string[]): void {
  argv.forEach((arg, index) => {
    const previous = argv[index - 1];
    if (previous !== undefined && VALUE_FLAGS.includes(previous)) {
      return;
    }
    if (arg.startsWith("-") && !VALUE_FLAGS.includes(arg) && !SWITCH_FLAGS.includes(arg)) {
      throw new InvalidConfigError(`Unknown option ${arg}. Run with --help for usage.`);
    }
    if (!arg.startsWith("-")) {
      throw new InvalidConfigError(`Unexpected argument "${arg}". Run with --help for usage.`);
    }
  });
}

function parseProvider(value: string | undefined): Provider | undefined {
  if (value === undefined) {
    return undefined;
  }
  const provider = PROVIDERS.find((candidate) => candidate === value.toLowerCase());
  if (!provider) {
    throw new InvalidConfigError(`Unknown provider "${value}". Expected one of: ${PROVIDERS.join(", ")}.`);
  }
  return provider;
}

function resolveCommand(argv: string[], input?: string, batchDir?: string): CliCommand {
  if (hasFlag(argv, "--help", "-h") || argv.length === 0) {
    return "help";
  }
  const modes = [
    input ? "process" : undefined,
    batchDir ? "batch" : undefined,
    hasFlag(argv, "--serve") ? "serve" : undefined,
    hasFlag(argv, "--list-models") ? "list-models" : undefined,
    hasFlag(argv, "--check") ? "check" : undefined
  ].filter((mode): mode is Exclude<CliCommand, "help"> => mode !== undefined);

  if (modes.length === 0) {
    throw new InvalidConfigError("Pass --input, --batch-dir, --serve, --list-models or --check.");
  }
  if (modes.length > 1) {
    throw new InvalidConfigError(`Options ${modes.join(" and ")} cannot be combined.`);
  }
  return modes[0];
}

export function parseCliArgs(rawArgv: string[]): CliOptions {
  const argv = splitInlineValues(rawArgv);
  assertKnownFlags(argv);

  const input = getArg(argv, "--input", "-i");
  const batchDir = getArg(argv, "--batch-dir", "-b");
  const command = resolveCommand(argv, input, batchDir);
  const output = getArg(argv, "--output", "-o");
  if (output && command !== "process") {
    throw new InvalidConfigError("--output only applies to single file mode; use --output-dir with --batch-dir.");
  }

  const threads = getNumber(argv, "--threads") ?? 1;
  if (!Number.isInteger(threads) || threads < 1) {
    throw new InvalidConfigError("--threads expects a positive integer.");
  }

  const overrides: ConfigOverrides = {
    provider: parseProvider(getArg(argv, "--provider")),
    model: getArg(argv, "--model", "-m"),
    endpointUrl: getArg(argv, "--url"),
    apiKey: getArg(argv, "--api-key"),
    temperature: getNumber(argv, "--temperature", "-t"),
    maxTokens: getNumber(argv, "--max-tokens"),
    batchTokens: getNumber(argv, "--batch-tokens"),
    tone: getArg(argv, "--tone"),
    formality: getArg(argv, "--formality"),
    promptFile: getArg(argv, "--prompt-file"),
    systemPrompt: getArg(argv, "--system-prompt"),
    timeoutMs: getNumber(argv, "--timeout"),
    maxAttempts: getNumber(argv, "--retries"),
    useChatApi: hasFlag(argv, "--no-chat") ? false : undefined,
    preserveFormatting: hasFlag(argv, "--no-preserve-formatting") ? false : undefined
  };

  return {
    command,
    input,
    batchDir,
    output,
    outputDir: getArg(argv, "--output-dir"),
    threads,
    report: hasFlag(argv, "--report"),
    stream: hasFlag(argv, "--stream"),
    quiet: hasFlag(argv, "--quiet", "-q"),
    port: getNumber(argv, "--port"),
    overrides
  };
}
