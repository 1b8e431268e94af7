import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const packageJson = z.object({ name: z.string(), version: z.string() }).passthrough();

/** Read the version from package.json, found from src/utils/ or dist/src/utils/. */
function readVersion(): string {
  const selfDir = dirname(fileURLToPath(import.meta.url));
  for (const p of [join(selfDir, "..", "..", "package.json"), join(selfDir, "..", "..", "..", "package.json")]) {
    if (!existsSync(p)) continue;
    try {
      const pkg = packageJson.safeParse(JSON.parse(readFileSync(p, "utf-8")));
      if (pkg.success && pkg.data.name === "modecortex") return pkg.data.version;
    } catch {
      // try next candidate
    }
  }
  return "unknown";
}

const VERSION = readVersion();

export function getVersion(): string {
  return VERSION;
}
