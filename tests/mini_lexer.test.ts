import { describe, expect, it } from "vitest";
import { LexicalError } from "../core/errors";
import { LexerConfig, MiniLexer, pop, push } from "../core/mini_lexer";

type ToyState = "root" | "paren" | "comment";
type ToyAction = "word" | "number" | "open" | "close";

const toyConfig: LexerConfig<ToyState, ToyAction> = {
  root: "root",
  states: {
    root: [
      { pattern: /\s+/ },
      { pattern: /\/\*/, next: push("comment") },
      { pattern: /\(/, action: "open", next: push("paren") },
      { pattern: /[a-z]+/, action: "word" },
      { pattern: /\d+/, action: "number" },
    ],
    paren: [
      { pattern: /\s+/ },
      { pattern: /\/\*/, next: push("comment") },
      { pattern: /\)/, action: "close", next: pop },
      { pattern: /[a-z]+/, action: "word" },
      { pattern: /\(/, action: "open", next: push("paren") },
    ],
    comment: [
      { pattern: /\*\//, next: pop },
      { pattern: /[^*]+|\*/ },
    ],
  },
};

const lexer = new MiniLexer(toyConfig);

function actions(text: string): string[] {
  return Array.from(lexer.run(text), (t) => t.action);
}

describe("MiniLexer", () => {
  it("emits offsets, ends and actions for silent and emitting rules", () => {
    const tokens = Array.from(lexer.run("abc 12"));
    expect(tokens).toEqual([
      { offset: 0, end: 3, action: "word", groups: [] },
      { offset: 4, end: 6, action: "number", groups: [] },
    ]);
  });

  it("passes capture groups through, with undefined for groups that did not take part", () => {
    const tagLexer = new MiniLexer<"root", "tag">({
      root: "root",
      states: { root: [{ pattern: /#(\w+)(?::(\d+))?/, action: "tag" }, { pattern: /\s+/ }] },
    });
    const tokens = Array.from(tagLexer.run("#a #b:7"));
    expect(tokens.map((t) => t.groups)).toEqual([
      ["a", undefined],
      ["b", "7"],
    ]);
  });

  it("follows pushes and pops through nested states and comments", () => {
    const stream = lexer.run("(a (b) /* ) */ c)");
    const tokens = Array.from(stream);
    expect(tokens.map((t) => [t.offset, t.action])).toEqual([
      [0, "open"],
      [1, "word"],
      [3, "open"],
      [4, "word"],
      [5, "close"],
      [15, "word"],
      [16, "close"],
    ]);
    expect(stream.states).toEqual(["root"]);
  });

  it("treats comments as transparent in every state", () => {
    expect(actions("/* ( */ a")).toEqual(["word"]);
    expect(actions("(/* ) */)")).toEqual(["open", "close"]);
  });

  it("leaves pushed states on the stack when the input ends early", () => {
    const stream = lexer.run("(a /* b");
    expect(Array.from(stream, (t) => t.action)).toEqual(["open", "word"]);
    expect(stream.states).toEqual(["root", "paren", "comment"]);
    expect(stream.position).toBe(7);
  });

  it("fails with the offset and state when no rule matches", () => {
    const seen: string[] = [];
    let error: unknown;
    try {
      for (const t of lexer.run("abc ?")) seen.push(t.action);
    } catch (err) {
      error = err;
    }
    expect(seen).toEqual(["word"]);
    expect(error).toBeInstanceOf(LexicalError);
    if (!(error instanceof LexicalError)) return;
    expect(error.offset).toBe(4);
    expect(error.state).toBe("root");
    expect(error.position).toEqual({ line: 1, column: 5 });
    expect(error.message).toBe('1:5: No rule matches in state "root" at "?"');
  });

  it("reports the line and column of a failure on a later line", () => {
    expect(() => actions("ab\n(cd\n 9)")).toThrow('3:2: No rule matches in state "paren" at "9)"');
  });

  it("commits to the first rule that matches", () => {
    const kw = new MiniLexer<"root", "keyword" | "word">({
      root: "root",
      states: {
        root: [
          { pattern: /if/, action: "keyword" },
          { pattern: /[a-z]+/, action: "word" },
          { pattern: /\s+/ },
        ],
      },
    });
    expect(Array.from(kw.run("if iffy"), (t) => `${t.action}:${t.end - t.offset}`)).toEqual([
      "keyword:2",
      "keyword:2",
      "word:2",
    ]);
  });

  it("skips empty matches that would not advance", () => {
    const lazy = new MiniLexer<"root", "xs" | "any">({
      root: "root",
      states: { root: [{ pattern: /x*/, action: "xs" }, { pattern: /./, action: "any" }] },
    });
    expect(Array.from(lazy.run("xxa"), (t) => t.action)).toEqual(["xs", "any"]);
  });

  it("can be iterated only once", () => {
    const stream = lexer.run("a b");
    expect(Array.from(stream)).toHaveLength(2);
    expect(() => Array.from(stream)).toThrow("Token stream has already been consumed");
  });

  it("starts every run from a fresh stack", () => {
    const first = lexer.run("(a");
    Array.from(first);
    expect(first.states).toEqual(["root", "paren"]);
    expect(actions("a")).toEqual(["word"]);
  });

  it("rejects popping the root state", () => {
    const bad = new MiniLexer<string, "a">({ root: "root", states: { root: [{ pattern: /\)/, next: pop }] } });
    expect(() => Array.from(bad.run(")"))).toThrow(LexicalError);
  });

  it("validates the configuration up front", () => {
    expect(() => new MiniLexer<string, "a">({ root: "start", states: { other: [] } })).toThrow(
      'Lexer root state "start" has no rules'
    );
    expect(
      () =>
        new MiniLexer<string, "a">({
          root: "root",
          states: { root: [{ pattern: /a/, next: push("nowhere") }] },
        })
    ).toThrow('pushes unknown state "nowhere"');
  });
});
