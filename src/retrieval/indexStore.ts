import { promises as fs } from "node:fs";
import path from "node:path";

import { ConfigurationError } from "../errors.js";
import { storedCollectionSchema, type StoredCollection } from "./types.js";

export function collectionPath(persistDirectory: string, collectionName: string): string {
  return path.join(persistDirectory, `${collectionName}.json`);
}

/** Writes to a sibling temp file and renames it over the target, so readers never see half a file. */
export async function saveIndex(filePath: string, index: StoredCollection): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.writeFile(tmpPath, JSON.stringify(index), "utf-8");
    await fs.rename(tmpPath, filePath);
  } catch (err: unknown) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

/** Returns `undefined` when no collection has been written yet. */
export async function loadIndex(filePath: string): Promise<StoredCollection | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return undefined;
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigurationError(`Index file is not valid JSON: ${filePath}`, { cause: err });
  }

  const parsed = storedCollectionSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Unsupported or corrupt index: ${filePath}\n${parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("\n")}`
    );
  }
  return parsed.data;
}
