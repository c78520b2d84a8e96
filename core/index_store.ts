// core/index_store.ts

import * as fs from "fs";
import * as path from "path";
import { ParsedFile } from "../types/hdl";

export const DEFAULT_INDEX_FILE = "hdl-modules.json";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * isParsedFile(value):
 *   Shallow shape check of one index entry. Module records themselves are trusted
 *   once their container has the right shape.
 */
export function isParsedFile(value: unknown): value is ParsedFile {
  return (
    isRecord(value) &&
    typeof value.filePath === "string" &&
    typeof value.language === "string" &&
    typeof value.mtimeMs === "number" &&
    Array.isArray(value.modules) &&
    value.modules.every((m) => isRecord(m) && m.kind === "module" && typeof m.name === "string")
  );
}

/**
 * loadIndex(rootDir, fileName):
 *   - Reads the index file from rootDir (if it exists).
 *   - Returns the entries that have the expected shape.
 *   - If the file is missing or not valid JSON, returns an empty array.
 *
 * The index lets a later run skip files whose mtime has not changed.
 */
export function loadIndex(rootDir: string, fileName = DEFAULT_INDEX_FILE): ParsedFile[] {
  const jsonPath = path.join(rootDir, fileName);
  if (!fs.existsSync(jsonPath)) return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(jsonPath, "utf8"));
  } catch (err) {
    console.warn(`⚠️  Failed to read or parse ${jsonPath}: ${(err as Error).message}. Starting from an empty index.`);
    return [];
  }
  if (!Array.isArray(parsed)) {
    console.warn(`⚠️  ${jsonPath} does not hold a list of files. Starting from an empty index.`);
    return [];
  }

  const entries = parsed.filter(isParsedFile);
  if (entries.length !== parsed.length) {
    console.warn(`⚠️  Dropped ${parsed.length - entries.length} malformed entr(y/ies) from ${jsonPath}.`);
  }
  return entries;
}

/**
 * writeIndex(rootDir, files, fileName):
 *   Serializes the entries (sorted by path) as pretty-printed JSON and returns the
 *   path written.
 */
export function writeIndex(rootDir: string, files: ParsedFile[], fileName = DEFAULT_INDEX_FILE): string {
  const jsonPath = path.join(rootDir, fileName);
  const sorted = [...files].sort((a, b) => a.filePath.localeCompare(b.filePath));
  fs.writeFileSync(jsonPath, JSON.stringify(sorted, null, 2), "utf8");
  return jsonPath;
}
