import type { Settings } from "../../config/settings.js";
import { ingestFaqFile } from "../../rag/ingest.js";

export async function runIngestCommand(args: string[], settings: Settings): Promise<void> {
  const corpusPath = args[0] ?? settings.corpusPath;

  const summary = await ingestFaqFile({ corpusPath, settings });
  process.stdout.write(
    `${summary.entries} entries indexed (dimension ${summary.dimension}, ${summary.missing} without vector)\n`
  );
}
