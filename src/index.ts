#!/usr/bin/env node
import { createRagComparison } from "./orchestrator/setup.js";
import { parseCliArgs, USAGE } from "./cli.js";

async function main() {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.success) {
    console.error(parsed.error.issues.map((issue) => issue.message).join("\n"));
    console.error(USAGE);
    process.exit(1);
  }
  const { mode, question } = parsed.data;

  const { comparison, close } = await createRagComparison();

  try {
    if (mode === "vector") {
      if (question) {
        await comparison.queryVectorRag(question);
      } else {
        await comparison.runVectorOnly();
      }
    } else if (mode === "graph") {
      if (question) {
        await comparison.queryGraphRag(question);
      } else {
        await comparison.runGraphOnly();
      }
    } else if (question) {
      await comparison.compareRagMethods(question);
    } else {
      await comparison.runComparison();
    }
  } finally {
    await close();
  }
}

main().catch((error) => {
  console.error("Error occurred:", error);
  console.error("Please check your configuration and try again.");
  process.exit(1);
});
