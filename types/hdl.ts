// types/hdl.ts

/** Direction of a module port. */
export type PortDirection = "input" | "output" | "inout";

/**
 * VerilogPort: one signal of a module's interface.
 * `dataType` is the composite type string, e.g. "wire", "reg [7:0]", "wire signed [3:0]".
 */
export interface VerilogPort {
  readonly name: string;
  readonly mode: PortDirection;
  readonly dataType: string;
  readonly desc?: string;
}

/**
 * VerilogParameter: a module parameter. The default value is kept verbatim,
 * it is never evaluated.
 */
export interface VerilogParameter {
  readonly name: string;
  readonly mode: "in";
  readonly dataType: string;
  readonly defaultValue?: string;
  readonly desc?: string;
}

/**
 * VerilogSubModule: one instantiation inside a module.
 *
 * `portConnections` maps the formal port or parameter name to the actual expression.
 * Positional connections are keyed by their index ("0", "1", ...), positional
 * parameter overrides by "#0", "#1", ...
 */
export interface VerilogSubModule {
  readonly moduleType: string;
  readonly instanceName: string;
  readonly portConnections: Readonly<Record<string, string>>;
  readonly desc?: string;
}

/**
 * VerilogModule: a finalized module record. Sections map a documentation label
 * to a contiguous run of port names.
 */
export interface VerilogModule {
  readonly kind: "module";
  readonly name: string;
  readonly ports: readonly VerilogPort[];
  readonly parameters: readonly VerilogParameter[];
  readonly sections: Readonly<Record<string, readonly string[]>>;
  readonly submodules: readonly VerilogSubModule[];
  readonly desc?: string;
}

/**
 * ParsedFile: every module extracted from one file, plus the language
 * identifier and the modification time the result was computed from.
 */
export interface ParsedFile {
  filePath: string; // absolute path
  language: string; // e.g. "verilog"
  mtimeMs: number;
  modules: VerilogModule[];
}

/**
 * LanguageParser: adapter interface for each HDL dialect.
 * Each adapter must:
 *  1. report which file extensions it supports
 *  2. parse a text buffer into module records
 *  3. read and parse a file by path
 */
export interface LanguageParser {
  /** Lowercase language identifier used on the command line and in the index. */
  readonly language: string;

  /** Return all lowercase extensions (including leading dot) that this parser handles. */
  supportedExtensions(): string[];

  /** Parse a text buffer. Throws an HdlParseError when the text cannot be parsed. */
  parseSource(text: string): VerilogModule[];

  /**
   * Read the file at `filePath` and parse it. Errors carry the file path.
   */
  extractModules(filePath: string, encoding?: BufferEncoding): Promise<VerilogModule[]>;
}
