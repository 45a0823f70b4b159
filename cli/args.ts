import { parseArgs } from "util";
import { isLocale } from "@/lib/response/locale";
import { LOCALES } from "@/types";
import type { Locale } from "@/types";

export const COMMANDS = ["ask", "explain", "cypher", "repl", "help"] as const;
export type CliCommand = (typeof COMMANDS)[number];

export interface CliOptions {
  command: CliCommand;
  text: string;
  locale?: Locale;
  json: boolean;
  useModel: boolean;
}

export const HELP = `Usage: brick-kg [command] [options] [text]

Commands:
  ask <question>      Answer a question against the graph (default)
  explain <question>  Show intent, GraphQL and Cypher without executing
  cypher <query>      Run a read-only Cypher query
  repl                Interactive session (default without arguments)
  help                Show this help

Options:
  --locale=en|no      Answer language
  --json              Print the full result as JSON
  --no-llm            Rule-based intent extraction only
  -h, --help          Show this help`;

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some(command => command === value);
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      locale: { type: "string" },
      json: { type: "boolean", default: false },
      "no-llm": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

export function parseCliArgs(argv: string[]): { options: CliOptions } | { error: string } {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    return { error: error instanceof Error ? error.message : String(error) };
  }

  const { values, positionals } = parsed;

  let locale: Locale | undefined;
  if (values.locale !== undefined) {
    if (!isLocale(values.locale)) {
      return { error: `Unsupported locale "${values.locale}" (expected ${LOCALES.join(" or ")})` };
    }
    locale = values.locale;
  }

  const [first, ...rest] = positionals;
  let command: CliCommand;
  let words: string[];
  if (values.help) {
    command = "help";
    words = [];
  } else if (first === undefined) {
    command = "repl";
    words = [];
  } else if (isCommand(first)) {
    command = first;
    words = rest;
  } else {
    command = "ask";
    words = positionals;
  }

  const text = words.join(" ").trim();
  if ((command === "ask" || command === "explain" || command === "cypher") && !text) {
    return { error: `"${command}" needs ${command === "cypher" ? "a query" : "a question"}` };
  }

  return {
    options: {
      command,
      text,
      locale,
      json: values.json === true,
      useModel: values["no-llm"] !== true,
    },
  };
}
