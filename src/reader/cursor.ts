import { createParseError, type LiteralParseError, type ParseErrorKind } from "../errors.ts";

const WHITESPACE = new Set([" ", "\t", "\f", "\v", "\r", "\n"]);
const WORD_START = /^[A-Za-z_]$/;
const WORD_PART = /^[A-Za-z0-9_]$/;

export class Cursor {
  position = 0;

  constructor(
    readonly source: string,
    private readonly allowComments = true,
  ) {}

  get atEnd(): boolean {
    return this.position >= this.source.length;
  }

  /** The UTF-16 unit at `position + ahead`, or `""` past the end. */
  peek(ahead = 0): string {
    return this.source.charAt(this.position + ahead);
  }

  peekCodePoint(): number {
    return this.source.codePointAt(this.position) ?? -1;
  }

  startsWith(text: string): boolean {
    return this.source.startsWith(text, this.position);
  }

  advance(count = 1): void {
    this.position = Math.min(this.position + count, this.source.length);
  }

  /** An identifier-shaped run starting at the cursor, without consuming it. */
  peekWord(): string {
    if (!WORD_START.test(this.peek())) return "";
    let end = this.position + 1;
    while (end < this.source.length && WORD_PART.test(this.source.charAt(end))) {
      end += 1;
    }
    return this.source.slice(this.position, end);
  }

  /** Skips whitespace, backslash line continuations and `#` comments. */
  skipTrivia(): void {
    while (!this.atEnd) {
      const char = this.peek();
      if (WHITESPACE.has(char)) {
        this.advance();
      } else if (char === "\\" && (this.peek(1) === "\n" || this.peek(1) === "\r")) {
        this.advance(this.peek(1) === "\r" && this.peek(2) === "\n" ? 3 : 2);
      } else if (char === "#" && this.allowComments) {
        while (!this.atEnd && this.peek() !== "\n" && this.peek() !== "\r") {
          this.advance();
        }
      } else {
        return;
      }
    }
  }

  fail(kind: ParseErrorKind, description: string, offset = this.position): LiteralParseError {
    return createParseError(this.source, kind, description, offset);
  }
}

/** Renders a single character for an error message. */
export function describeChar(char: string): string {
  return char.length === 0 ? "end of input" : JSON.stringify(char);
}
