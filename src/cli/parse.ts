export type Command = "ingest" | "ask";

export function parseCli(argv: string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  if (command !== "ingest" && command !== "ask") {
    throw new Error("Usage: faqdesk <ingest|ask> [...]");
  }
  return { command, args: rest };
}

/** Splits `--top N` off the ask arguments; the rest is the question. */
export function parseAskArgs(args: string[]): { question: string; top: number } {
  const words: string[] = [];
  let top = 0;
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? "";
    if (arg === "--top") {
      const value = Number.parseInt(args[i + 1] ?? "", 10);
      if (!Number.isFinite(value) || value <= 0) {
        throw new Error("Usage: faqdesk ask [--top N] <question>");
      }
      top = value;
      i += 1;
      continue;
    }
    words.push(arg);
  }
  return { question: words.join(" ").trim(), top };
}
