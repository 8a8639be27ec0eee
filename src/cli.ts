import { CliArgsSchema } from "./types/zodSchemas.js";

export const USAGE = `Usage: node dist/src/index.js [--mode vector|graph|compare] [--question "<question>"]
  --mode vector    Run vector RAG only
  --mode graph     Run graph RAG only
  --mode compare   Run side-by-side comparison (default)
  --question       Single question instead of the built-in test questions`;

/**
 * Validate `--mode` / `--question` flags; a flag without a value counts as absent
 */
export function parseCliArgs(argv: string[]) {
  const valueOf = (flag: string) => {
    const index = argv.indexOf(flag);
    const value = index >= 0 ? argv[index + 1] : undefined;
    return value === undefined || value.startsWith("--") ? undefined : value;
  };

  return CliArgsSchema.safeParse({
    mode: valueOf("--mode"),
    question: valueOf("--question"),
  });
}
