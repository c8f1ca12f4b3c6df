#!/usr/bin/env node
import { loadConfig } from "./lib/config";
import { consoleLogger, runInjectMetadata, runPreview } from "./lib/pipeline";

async function main(argv: string[]): Promise<number> {
  const command = argv[0] ?? "highlight";
  const config = loadConfig();

  if (command === "inject-metadata") {
    await runInjectMetadata(config.changedFiles, consoleLogger);
    return 0;
  }
  if (command !== "highlight") {
    console.error(`Unknown command: ${command} (expected "highlight" or "inject-metadata")`);
    return 2;
  }

  const report = await runPreview(config, { logger: consoleLogger });
  return config.strict && report.failed > 0 ? 1 : 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
);
