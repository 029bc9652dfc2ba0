import fs from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";
import { text } from "node:stream/consumers";

export type TextSource = string | Readable;

export async function ensureDir(dir: string) {
  await fs.mkdir(dir, { recursive: true });
}

/** Read a whole file, or a stream such as stdin, as UTF-8. "-" means stdin. */
export async function readSource(source: TextSource = process.stdin): Promise<string> {
  if (source === "-") return text(process.stdin);
  if (typeof source === "string") return fs.readFile(source, "utf8");
  return text(source);
}

export async function writeText(filePath: string, payload: string) {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, payload, "utf8");
}
