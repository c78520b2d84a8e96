// index.ts

export * from "./types/hdl";
export { HdlParseError, LexicalError, StructuralError, BuilderError, locate } from "./core/errors";
export type { SourcePosition } from "./core/errors";
export { MiniLexer, TokenStream, push, pop, stay } from "./core/mini_lexer";
export type { LexerConfig, LexerRule, LexToken, Transition } from "./core/mini_lexer";
export { ModuleExtractor } from "./core/module_cache";
export { DEFAULT_INDEX_FILE, loadIndex, writeIndex, isParsedFile } from "./core/index_store";
export { SourceWalker } from "./core/source_walker";
export type { WalkerOptions } from "./core/source_walker";
export {
  ALL_PARSERS,
  getActiveParsers,
  extensionTable,
  collectExtensions,
  parserForFile,
  languagesForFiles,
} from "./language";
export { VerilogParser, parseVerilog, parseVerilogFile, isVerilogFile, VERILOG_EXTENSIONS } from "./language/parser_verilog";
export { verilogRules, VerilogLexer } from "./language/verilog_rules";
export type { VerilogAction, VerilogState } from "./language/verilog_rules";
export { VerilogModuleBuilder, composeType, resolveSections } from "./language/verilog_builder";
export {
  describePort,
  describeParameter,
  describeSubModule,
  formatModule,
  formatToken,
  formatTokens,
  errorContext,
} from "./report/module_report";
