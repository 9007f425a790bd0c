import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** Repository root, whether running from `src/` or from the compiled `dist/src/`. */
export function projectRoot(): string {
  const candidate = path.resolve(__dirname, "../..");
  return path.basename(candidate) === "dist" ? path.dirname(candidate) : candidate;
}

export function resolveDataDir(): string {
  const override = process.env.BOT_DATA_DIR?.trim();
  return override ? path.resolve(override) : path.join(projectRoot(), "data");
}

export async function ensureDataDir(): Promise<string> {
  const dir = resolveDataDir();
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

export function resolveDataFile(fileName: string): string {
  return path.join(resolveDataDir(), fileName);
}

export async function ensureDataFile(fileName: string, initialValue = ""): Promise<string> {
  const dir = await ensureDataDir();
  const fullPath = path.join(dir, fileName);
  try {
    await fs.access(fullPath);
  } catch {
    await fs.writeFile(fullPath, initialValue, { encoding: "utf8" });
  }
  return fullPath;
}
