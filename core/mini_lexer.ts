// core/mini_lexer.ts

/**
 * MiniLexer: a small table-driven tokenizer with a state stack.
 *
 * The lexer is configured with named states, each holding an ordered list of rules.
 * At every position the rules of the state on top of the stack are tried in order and
 * the first match wins. A rule may emit an action (with the pattern's capture groups)
 * and may push a new state or pop the current one. Rules without an action are silent:
 * they still consume text and still transition.
 *
 * The lexer knows nothing about any particular language; the rule table is data.
 */

import { LexicalError, locate } from "./errors";

/** What happens to the state stack after a rule matched. */
export type Transition<S extends string> =
  | { readonly kind: "push"; readonly state: S }
  | { readonly kind: "pop" }
  | { readonly kind: "stay" };

export const push = <S extends string>(state: S): Transition<S> => ({ kind: "push", state });
export const pop: Transition<never> = { kind: "pop" };
export const stay: Transition<never> = { kind: "stay" };

export interface LexerRule<S extends string, A extends string> {
  /** Matched anchored at the cursor; flags other than i/m/s/u are ignored. */
  readonly pattern: RegExp;
  readonly action?: A;
  readonly next?: Transition<S>;
}

export interface LexerConfig<S extends string, A extends string> {
  readonly root: S;
  readonly states: { readonly [K in S]: readonly LexerRule<S, A>[] };
}

/**
 * LexToken: one emission of the lexer.
 *  - offset: index of the first matched character
 *  - end: index just past the match
 *  - groups: the pattern's capture groups, `undefined` where a group did not take part
 */
export interface LexToken<A extends string> {
  readonly offset: number;
  readonly end: number;
  readonly action: A;
  readonly groups: readonly (string | undefined)[];
}

interface CompiledRule<S extends string, A extends string> {
  regex: RegExp;
  action?: A;
  next: Transition<S>;
}

/**
 * TokenStream: the lazy result of MiniLexer.run().
 *
 * It can be iterated exactly once. After iteration `states` holds the final state stack,
 * which lets the caller decide whether ending outside the root state is an error.
 */
export class TokenStream<S extends string, A extends string> implements Iterable<LexToken<A>> {
  private readonly stack: S[];
  private started = false;
  private cursor = 0;

  constructor(
    private readonly table: ReadonlyMap<string, CompiledRule<S, A>[]>,
    root: S,
    readonly text: string
  ) {
    this.stack = [root];
  }

  /** State stack, bottom first. */
  get states(): readonly S[] {
    return this.stack;
  }

  /** Offset the scan has reached so far. */
  get position(): number {
    return this.cursor;
  }

  *[Symbol.iterator](): Generator<LexToken<A>, void, undefined> {
    if (this.started) {
      throw new Error("Token stream has already been consumed; run the lexer again.");
    }
    this.started = true;

    const text = this.text;
    while (this.cursor < text.length) {
      const state = this.stack[this.stack.length - 1];
      const rules = this.table.get(state) ?? [];
      let matched = false;

      for (const rule of rules) {
        rule.regex.lastIndex = this.cursor;
        const m = rule.regex.exec(text);
        if (!m) continue;

        const end = this.cursor + m[0].length;
        // An empty match that leaves the stack alone would never advance.
        if (end === this.cursor && rule.next.kind === "stay") continue;

        const offset = this.cursor;
        this.cursor = end;
        this.transition(rule.next, offset);
        matched = true;
        if (rule.action !== undefined) {
          yield { offset, end, action: rule.action, groups: m.slice(1) };
        }
        break;
      }

      if (!matched) {
        throw new LexicalError(
          `No rule matches in state "${state}" at ${describeChar(text, this.cursor)}`,
          this.cursor,
          locate(text, this.cursor),
          state
        );
      }
    }
  }

  private transition(next: Transition<S>, offset: number): void {
    switch (next.kind) {
      case "push":
        this.stack.push(next.state);
        break;
      case "pop":
        if (this.stack.length === 1) {
          throw new LexicalError(
            `Rule pops the root state "${this.stack[0]}"`,
            offset,
            locate(this.text, offset),
            this.stack[0]
          );
        }
        this.stack.pop();
        break;
      case "stay":
        break;
    }
  }
}

function describeChar(text: string, offset: number): string {
  return JSON.stringify(text.slice(offset, offset + 12));
}

/**
 * MiniLexer:
 *   Compiles a LexerConfig once and scans any number of inputs with it.
 *   Each call to run() starts from a fresh state stack; no state is shared between runs.
 */
export class MiniLexer<S extends string, A extends string> {
  private readonly table = new Map<string, CompiledRule<S, A>[]>();

  constructor(private readonly config: LexerConfig<S, A>) {
    const names = Object.keys(config.states);
    if (!names.includes(config.root)) {
      throw new Error(`Lexer root state "${config.root}" has no rules`);
    }

    const entries: [string, readonly LexerRule<S, A>[]][] = Object.entries(config.states);
    for (const [name, rules] of entries) {
      const compiled = rules.map((rule): CompiledRule<S, A> => {
        const next = rule.next ?? stay;
        if (next.kind === "push" && !names.includes(next.state)) {
          throw new Error(`Rule ${rule.pattern} in state "${name}" pushes unknown state "${next.state}"`);
        }
        return { regex: anchored(rule.pattern), action: rule.action, next };
      });
      this.table.set(name, compiled);
    }
  }

  /** Name of the state every run starts in. */
  get root(): S {
    return this.config.root;
  }

  run(text: string): TokenStream<S, A> {
    return new TokenStream(this.table, this.config.root, text);
  }
}

/** Rebuild the pattern as a sticky expression so it only matches at lastIndex. */
function anchored(pattern: RegExp): RegExp {
  const flags = pattern.flags.replace(/[^imsu]/g, "");
  return new RegExp(pattern.source, flags + "y");
}
