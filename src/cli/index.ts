import { loadDotenvFiles } from "../config/env.js";
import { loadSettings } from "../config/settings.js";
import { setLogLevel } from "../utils/logger.js";
import { runAskCommand } from "./commands/ask.js";
import { runIngestCommand } from "./commands/ingest.js";
import { parseCli } from "./parse.js";

export async function main(argv: string[]): Promise<void> {
  loadDotenvFiles();
  const settings = loadSettings();
  setLogLevel(settings.logLevel);
  const parsed = parseCli(argv);

  if (parsed.command === "ingest") {
    await runIngestCommand(parsed.args, settings);
    return;
  }

  await runAskCommand(parsed.args, settings);
}

try {
  await main(process.argv);
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
}
