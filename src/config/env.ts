import fs from "node:fs";
import path from "node:path";

import dotenv from "dotenv";

/**
 * Loads DOTENV_CONFIG_PATH when set, else the first `.env` found in the
 * working directory or its parent. Returns the file that was loaded.
 */
export function loadDotenvFiles(cwd: string = process.cwd()): string | null {
  const explicitPath = process.env.DOTENV_CONFIG_PATH;
  if (explicitPath) {
    dotenv.config({ path: explicitPath });
    return explicitPath;
  }

  const candidate = [path.join(cwd, ".env"), path.join(cwd, "..", ".env")].find((p) =>
    fs.existsSync(p)
  );
  if (!candidate) return null;
  dotenv.config({ path: candidate });
  return candidate;
}
