// core/errors.ts

/** 1-based line and column of an offset in a text buffer. */
export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * locate(text, offset):
 *   Convert a character offset into a 1-based line/column pair.
 *   Offsets past the end are clamped to the end of the text.
 */
export function locate(text: string, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, text.length);
  for (let i = 0; i < end; i++) {
    if (text.charCodeAt(i) === 10 /* \n */) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: end - lineStart + 1 };
}

/**
 * HdlParseError: base class of every failure raised while turning HDL text into
 * module records. There is no partial result: when one of these is thrown the
 * whole input is unparseable.
 */
export class HdlParseError extends Error {
  filePath?: string;

  constructor(
    readonly reason: string,
    readonly offset?: number,
    readonly position?: SourcePosition
  ) {
    super(reason);
    this.name = new.target.name;
    this.message = this.render();
  }

  /**
   * inFile(filePath):
   *   Annotate the error with the file it came from and rewrite the message as
   *   "path:line:column: reason". Returns the same error so it can be rethrown inline.
   */
  inFile(filePath: string): this {
    this.filePath = filePath;
    this.message = this.render();
    return this;
  }

  private render(): string {
    const where = this.position ? `${this.position.line}:${this.position.column}` : undefined;
    if (this.filePath) {
      return where ? `${this.filePath}:${where}: ${this.reason}` : `${this.filePath}: ${this.reason}`;
    }
    return where ? `${where}: ${this.reason}` : this.reason;
  }
}

/** No lexer rule matched at `offset` in lexer state `state`. */
export class LexicalError extends HdlParseError {
  constructor(
    reason: string,
    offset: number,
    position: SourcePosition,
    readonly state: string
  ) {
    super(reason, offset, position);
  }
}

/**
 * The input ended in the middle of a construct: a comment, module or
 * instantiation that was never closed.
 */
export class StructuralError extends HdlParseError {
  constructor(
    reason: string,
    readonly openStates: readonly string[],
    offset?: number,
    position?: SourcePosition
  ) {
    super(reason, offset, position);
  }
}

/** The entity builder received an action it cannot apply in its current state. */
export class BuilderError extends HdlParseError {
  constructor(
    reason: string,
    readonly action: string,
    offset?: number,
    position?: SourcePosition
  ) {
    super(reason, offset, position);
  }
}
