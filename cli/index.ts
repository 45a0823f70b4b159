import { loadConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { createRuntime } from "@/lib/pipeline/setup";
import { HELP, parseCliArgs } from "./args";
import { runAsk, runCypher, runExplain, runRepl } from "./commands";
import type { CliContext } from "./commands";

async function main(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if ("error" in parsed) {
    console.error(`Error: ${parsed.error}\n`);
    console.error(HELP);
    return 2;
  }

  const { options } = parsed;
  if (options.command === "help") {
    console.log(HELP);
    return 0;
  }

  const config = loadConfig();
  const runtime = createRuntime(config, { useModel: options.useModel });
  const ctx: CliContext = {
    config,
    pipeline: runtime.pipeline,
    engine: runtime.engine,
    print: text => console.log(text),
  };

  try {
    switch (options.command) {
      case "ask":
        return await runAsk(ctx, options.text, options.locale, options.json);
      case "explain":
        return await runExplain(ctx, options.text, options.json);
      case "cypher":
        return await runCypher(ctx, options.text, options.json);
      case "repl":
        return await runRepl(ctx, options.locale);
      default:
        return 0;
    }
  } finally {
    await runtime.engine.close();
  }
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
