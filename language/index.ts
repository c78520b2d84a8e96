// language/index.ts

import * as path from "path";
import { LanguageParser } from "../types/hdl";
import { VerilogParser } from "./parser_verilog";

/**
 * ALL_PARSERS: map from language identifier → LanguageParser instance.
 * Sibling dialects plug in here with their own rule table and builder.
 */
export const ALL_PARSERS: { [lang: string]: LanguageParser } = {
  verilog: new VerilogParser(),
};

/**
 * getActiveParsers(requestedLangs):
 *   Every registered parser when nothing is requested, otherwise the requested ones
 *   (case-insensitive, each at most once). Unknown names are reported and skipped.
 */
export function getActiveParsers(requestedLangs: string[] | null): LanguageParser[] {
  if (!requestedLangs?.length) return Object.values(ALL_PARSERS);

  const active = new Set<LanguageParser>();
  for (const lang of requestedLangs) {
    const key = lang.toLowerCase();
    if (Object.hasOwn(ALL_PARSERS, key)) {
      active.add(ALL_PARSERS[key]);
    } else {
      console.warn(`⚠️  Unknown language "${lang}" ignored (known: ${Object.keys(ALL_PARSERS).join(", ")}).`);
    }
  }
  return Array.from(active);
}

/**
 * extensionTable(parsers):
 *   Lowercased extension → parser handling it. When two parsers claim an extension
 *   the earlier one keeps it.
 */
export function extensionTable(parsers: readonly LanguageParser[]): Map<string, LanguageParser> {
  const table = new Map<string, LanguageParser>();
  for (const parser of parsers) {
    for (const ext of parser.supportedExtensions()) {
      const key = ext.toLowerCase();
      if (!table.has(key)) table.set(key, parser);
    }
  }
  return table;
}

/** Extensions the parsers handle, in registration order. */
export function collectExtensions(parsers: readonly LanguageParser[]): string[] {
  return Array.from(extensionTable(parsers).keys());
}

/** The parser that handles the file's extension, if any. */
export function parserForFile(filePath: string, parsers: readonly LanguageParser[]): LanguageParser | undefined {
  return extensionTable(parsers).get(path.extname(filePath).toLowerCase());
}

/**
 * languagesForFiles(files):
 *   Languages of the registered parsers that would handle at least one of the files.
 */
export function languagesForFiles(files: readonly string[]): string[] {
  const table = extensionTable(Object.values(ALL_PARSERS));
  const found = new Set<string>();
  for (const file of files) {
    const parser = table.get(path.extname(file).toLowerCase());
    if (parser) found.add(parser.language);
  }
  return Array.from(found);
}

export { isVerilogFile } from "./parser_verilog";
