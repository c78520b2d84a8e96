// language/verilog_rules.ts

/**
 * Lexer rule table for Verilog (with the common SystemVerilog net keywords).
 *
 * The table only has to find the documentation-relevant constructs: module headers,
 * parameter and port declarations, instantiations and comments. Module bodies are
 * otherwise skipped word by word. Rule order inside a state matters: the first
 * pattern that matches at the cursor wins.
 */

import { LexerConfig, LexerRule, MiniLexer, pop, push } from "../core/mini_lexer";

export type VerilogState =
  | "root"
  | "module"
  | "parameters"
  | "port_list"
  | "submodule_params"
  | "submodule"
  | "block_comment"
  | "skip_function"
  | "skip_task";

export type VerilogAction =
  | "module_open"
  | "module_close"
  | "parameter_group_open"
  | "parameter_item_with_default"
  | "parameter_item"
  | "port_group_open"
  | "port_item"
  | "section_marker"
  | "submodule_with_params_open"
  | "submodule_open"
  | "submodule_params_close"
  | "submodule_connection"
  | "submodule_positional"
  | "submodule_close"
  | "metacomment"
  | "body_metacomment";

type Rule = LexerRule<VerilogState, VerilogAction>;

// ---------- shared pattern fragments ----------

const RANGE = String.raw`\[[^\]]*\]`;
const STRING = String.raw`"(?:[^"\\\n]|\\.)*"`;
const PARENS = String.raw`\((?:[^()]|\((?:[^()]|\([^()]*\))*\))*\)`;
const BRACES = String.raw`\{(?:[^{}]|\{[^{}]*\})*\}`;
// a slash that does not open a comment
const SLASH = String.raw`\/(?![\/*])`;
// one element of an expression that stops at a top-level , ; or )
const EXPR_ATOM = String.raw`${STRING}|${PARENS}|${BRACES}|${RANGE}|${SLASH}|[^,;()\[\]{}"\/]`;
const CONNECTION_ATOM = String.raw`${STRING}|${PARENS}|[^()"]`;

const NET_TYPES = [
  "reg", "wire", "logic", "tri", "triand", "trior", "tri0", "tri1",
  "wand", "wor", "supply0", "supply1", "uwire", "var", "bit",
  // variable ports
  "integer", "realtime", "real", "time", "int", "byte", "shortint", "longint",
].join("|");

const PARAM_TYPES = [
  "integer", "realtime", "real", "time", "signed", "unsigned",
  "int", "logic", "bit", "byte", "shortint", "longint", "string", "type",
].join("|");

const DIRECTIVES = [
  "define", "undef", "include", "timescale", "ifdef", "ifndef", "elsif", "else", "endif",
  "default_nettype", "resetall", "celldefine", "endcelldefine", "pragma", "line",
  "begin_keywords", "end_keywords", "unconnected_drive", "nounconnected_drive",
].join("|");

// Statement keywords that can look like "type name (" at the start of an instantiation.
const STATEMENT_KEYWORDS = [
  "always", "always_comb", "always_ff", "always_latch", "assign", "assert", "assume",
  "begin", "case", "casex", "casez", "cover", "default", "defparam", "deassign",
  "disable", "do", "else", "end", "endcase", "endgenerate", "fork", "force", "forever",
  "for", "foreach", "generate", "genvar", "if", "initial", "final", "join", "join_any",
  "join_none", "localparam", "integer", "real", "realtime", "time", "reg", "wire",
  "logic", "tri", "triand", "trior", "tri0", "tri1", "wand", "wor", "supply0", "supply1",
  "bit", "byte", "int", "shortint", "longint", "event", "repeat", "release", "return",
  "while", "wait", "typedef", "struct", "union", "enum", "packed", "signed", "unsigned",
  "and", "nand", "or", "nor", "xor", "xnor", "not", "buf", "bufif0", "bufif1",
  "notif0", "notif1", "pullup", "pulldown", "posedge", "negedge", "specify",
  "endspecify", "unique", "priority",
].join("|");

const re = (source: string): RegExp => new RegExp(source);

// ---------- rules shared by several states ----------

const whitespace: Rule = { pattern: /\s+/ };
const stringLiteral: Rule = { pattern: re(STRING) };
const blockCommentOpen: Rule = { pattern: /\/\*/, next: push("block_comment") };
const emptyLineComment: Rule = { pattern: /\/\/#*[ \t\r]*(?:\n|$)/ };
const sectionMarker: Rule = {
  pattern: /\/\/#[ \t]*\{\{(.*?)\}\}[^\n]*(?:\n|$)/,
  action: "section_marker",
};
const docComment: Rule = { pattern: /\/\/#+[ \t]*([^\n]*?)[ \t\r]*(?:\n|$)/, action: "metacomment" };
const lineCommentAsMeta: Rule = { pattern: /\/\/[ \t]*([^\n]*?)[ \t\r]*(?:\n|$)/, action: "metacomment" };
const sectionMarkerSilent: Rule = { pattern: sectionMarker.pattern };
// sections label ports only; a marker opening a parameter list is dropped
const sectionMarkerBeforeParameter: Rule = {
  pattern: /\/\/#[ \t]*\{\{.*?\}\}[^\n]*(?:\n|$)(?=\s*parameter\b)/,
};
// attribute instance, e.g. (* mark_debug = "true" *)
const attribute: Rule = { pattern: /\(\*[\s\S]*?\*\)/ };
const lineCommentSilent: Rule = { pattern: /\/\/[^\n]*(?:\n|$)/ };
const directive: Rule = { pattern: re(String.raw`\`(?:${DIRECTIVES})\b(?:[^\n\\]|\\[\s\S])*`) };
const macroUse: Rule = { pattern: /`\w+/ };
const anyWord: Rule = { pattern: /\w+|[^\w\s]/ };

const portGroupOpen: Rule = {
  pattern: re(
    String.raw`\b(input|output|inout)\b\s*(?:\b(${NET_TYPES})\b\s*)?(?:\b(signed|unsigned)\b\s*)?(${RANGE})?`
  ),
  action: "port_group_open",
};

const parameterGroupOpen: Rule = {
  pattern: re(String.raw`\bparameter\b\s*(?:\b(${PARAM_TYPES})\b\s*)?(${RANGE})?`),
  action: "parameter_group_open",
};

const namedConnection: Rule = {
  pattern: re(String.raw`\.\s*(\w+)(?:\s*\(\s*((?:${CONNECTION_ATOM})*?)\s*\))?`),
  action: "submodule_connection",
};

const positionalConnection: Rule = {
  pattern: re(String.raw`((?:${EXPR_ATOM})+?)(?=\s*(?:[,)]|\/[\/*]))`),
  action: "submodule_positional",
};

export const verilogRules: LexerConfig<VerilogState, VerilogAction> = {
  root: "root",
  states: {
    root: [
      whitespace,
      blockCommentOpen,
      emptyLineComment,
      sectionMarkerSilent,
      docComment,
      lineCommentAsMeta,
      stringLiteral,
      directive,
      macroUse,
      {
        pattern: /\b(?:macro)?module\s+(?:(?:automatic|static)\s+)?(\w+)\s*/,
        action: "module_open",
        next: push("module"),
      },
      anyWord,
    ],
    module: [
      whitespace,
      blockCommentOpen,
      emptyLineComment,
      sectionMarkerBeforeParameter,
      sectionMarker,
      { ...docComment, action: "body_metacomment" },
      lineCommentSilent,
      stringLiteral,
      directive,
      macroUse,
      { pattern: /\bendmodule\b/, action: "module_close", next: pop },
      { pattern: /\bfunction\b/, next: push("skip_function") },
      { pattern: /\btask\b/, next: push("skip_task") },
      { ...parameterGroupOpen, next: push("parameters") },
      { ...portGroupOpen, next: push("port_list") },
      { pattern: re(String.raw`\b(?:${STATEMENT_KEYWORDS})\b`) },
      {
        pattern: /\b(\w+)\s*#\s*\(/,
        action: "submodule_with_params_open",
        next: push("submodule_params"),
      },
      {
        pattern: re(String.raw`\b(\w+)\s+(\w+)\s*(?:${RANGE}\s*)?\(`),
        action: "submodule_open",
        next: push("submodule"),
      },
      anyWord,
    ],
    parameters: [
      whitespace,
      attribute,
      blockCommentOpen,
      emptyLineComment,
      sectionMarkerSilent,
      docComment,
      lineCommentAsMeta,
      directive,
      parameterGroupOpen,
      {
        pattern: re(String.raw`(\w+)\s*=\s*((?:${EXPR_ATOM})+)`),
        action: "parameter_item_with_default",
      },
      { pattern: /(\w+)(?=\s*(?:[,;)]|\/[\/*]))/, action: "parameter_item" },
      { pattern: /,/ },
      { pattern: /[);]/, next: pop },
    ],
    port_list: [
      whitespace,
      attribute,
      blockCommentOpen,
      emptyLineComment,
      sectionMarker,
      docComment,
      lineCommentAsMeta,
      directive,
      portGroupOpen,
      { pattern: re(String.raw`(\w+)(?:\s*${RANGE})*(?:\s*,)?`), action: "port_item" },
      // initial value of an output variable, e.g. "output reg q = 1'b0"
      { pattern: re(String.raw`=(?:${EXPR_ATOM})*`) },
      { pattern: /[);]/, next: pop },
    ],
    submodule_params: [
      whitespace,
      attribute,
      blockCommentOpen,
      emptyLineComment,
      lineCommentSilent,
      {
        pattern: re(String.raw`\)\s*(\w+)(?:\s*${RANGE})?\s*\(`),
        action: "submodule_params_close",
      },
      { pattern: /\)\s*;/, action: "submodule_close", next: pop },
      { pattern: /\.\*/ },
      namedConnection,
      positionalConnection,
      { pattern: /,/ },
    ],
    submodule: [
      whitespace,
      attribute,
      blockCommentOpen,
      emptyLineComment,
      lineCommentSilent,
      { pattern: /\)\s*;/, action: "submodule_close", next: pop },
      { pattern: /\.\*/ },
      namedConnection,
      positionalConnection,
      { pattern: /,/ },
    ],
    block_comment: [
      { pattern: /\*\//, next: pop },
      { pattern: /[^*]+/ },
      { pattern: /\*/ },
    ],
    skip_function: [
      whitespace,
      blockCommentOpen,
      lineCommentSilent,
      stringLiteral,
      { pattern: /\bendfunction\b/, next: pop },
      anyWord,
    ],
    skip_task: [
      whitespace,
      blockCommentOpen,
      lineCommentSilent,
      stringLiteral,
      { pattern: /\bendtask\b/, next: pop },
      anyWord,
    ],
  },
};

/** Shared lexer instance; every run() call starts from a fresh state stack. */
export const VerilogLexer = new MiniLexer(verilogRules);
