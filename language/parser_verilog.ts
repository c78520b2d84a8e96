/**
 * @file language/parser_verilog.ts
 * @description Verilog adapter: rule-table lexer plus module builder behind the
 * LanguageParser interface.
 */

import * as fs from "fs";
import * as path from "path";
import { HdlParseError } from "../core/errors";
import { LanguageParser, VerilogModule } from "../types/hdl";
import { VerilogModuleBuilder } from "./verilog_builder";
import { VerilogLexer } from "./verilog_rules";

export const VERILOG_EXTENSIONS = [".v", ".vlog", ".vh", ".sv", ".svh"];

/**
 * Identify a file as Verilog by its extension (case-insensitive).
 */
export function isVerilogFile(fileName: string): boolean {
  return VERILOG_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

/**
 * Parse a text buffer of Verilog code into module records.
 *
 * Synchronous and self-contained: every call runs a fresh lexer pass, so parsing the
 * same text twice gives equal results. Throws LexicalError, StructuralError or
 * BuilderError; there is no partial result.
 */
export function parseVerilog(text: string): VerilogModule[] {
  return VerilogModuleBuilder.build(VerilogLexer.run(text));
}

/**
 * Read a Verilog file and parse it. A leading byte-order mark is dropped.
 * Parse errors are annotated with the file path.
 */
export async function parseVerilogFile(
  filePath: string,
  encoding: BufferEncoding = "utf8"
): Promise<VerilogModule[]> {
  const raw = await fs.promises.readFile(filePath, encoding);
  const text = raw.startsWith("\uFEFF") ? raw.slice(1) : raw;
  try {
    return parseVerilog(text);
  } catch (err) {
    if (err instanceof HdlParseError) {
      throw err.inFile(filePath);
    }
    throw err;
  }
}

/**
 * VerilogParser: implements LanguageParser for Verilog sources.
 */
export class VerilogParser implements LanguageParser {
  readonly language = "verilog";

  supportedExtensions(): string[] {
    return [...VERILOG_EXTENSIONS];
  }

  parseSource(text: string): VerilogModule[] {
    return parseVerilog(text);
  }

  async extractModules(filePath: string, encoding?: BufferEncoding): Promise<VerilogModule[]> {
    if (!isVerilogFile(filePath)) {
      throw new Error(`${filePath}: not a Verilog file (expected one of ${VERILOG_EXTENSIONS.join(", ")})`);
    }
    return parseVerilogFile(filePath, encoding);
  }
}
