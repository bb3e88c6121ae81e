import { Effect, Either } from "effect";

import { LiteralParseError } from "./errors.ts";
import { resolveParseOptions, type ParseOptions } from "./options.ts";
import { Cursor, describeChar } from "./reader/cursor.ts";
import { isNumericStart, readNumber, type NumericValue } from "./reader/numeric.ts";
import { isTextStart, readText } from "./reader/text.ts";
import { Value, type DictEntry } from "./value.ts";

export type SafeParseSuccess<T> = Readonly<{ success: true; data: T }>;
export type SafeParseFailure<E> = Readonly<{ success: false; error: E }>;
export type SafeParseResult<T, E> = SafeParseSuccess<T> | SafeParseFailure<E>;

const CLOSERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const SEPARATORS = new Set([",", ":", ")", "]", "}"]);

function negate(value: NumericValue): NumericValue {
  switch (value._tag) {
    case "Integer":
      return Value.integer(-value.value);
    case "Float":
      return Value.float(-value.value);
    case "Complex":
      return Value.complex(-value.real, -value.imag);
  }
}

class LiteralParser {
  private depth = 0;

  constructor(
    private readonly cursor: Cursor,
    private readonly maxDepth: number,
  ) {}

  parseDocument(): Value {
    const value = this.parseAtom();
    this.cursor.skipTrivia();
    if (!this.cursor.atEnd) {
      throw this.cursor.fail(
        "TrailingInput",
        `Unexpected ${describeChar(this.cursor.peek())} after a complete literal`,
      );
    }
    return value;
  }

  private parseAtom(): Value {
    const cursor = this.cursor;
    cursor.skipTrivia();
    if (cursor.atEnd) {
      throw cursor.fail("UnexpectedEndOfInput", "Expected a literal but reached the end of input");
    }

    const char = cursor.peek();
    switch (char) {
      case "(":
        return this.parseParenthesized();
      case "[":
        return this.parseList();
      case "{":
        return this.parseBraces();
      case "+":
      case "-":
        return this.parseNumber();
    }

    if (isTextStart(cursor)) return readText(cursor);
    if (isNumericStart(cursor)) return this.parseNumber();

    const word = cursor.peekWord();
    switch (word) {
      case "None":
        cursor.advance(word.length);
        return Value.none();
      case "True":
      case "False":
        cursor.advance(word.length);
        return Value.boolean(word === "True");
      case "set":
        return this.parseEmptySet();
    }

    if (SEPARATORS.has(char)) {
      throw cursor.fail(
        "MalformedCollection",
        `Unexpected ${describeChar(char)} where a value was expected`,
      );
    }
    throw cursor.fail("UnexpectedToken", `Unexpected ${word ? `"${word}"` : describeChar(char)}`);
  }

  /** A signed number, or `real ± imagj` when an imaginary literal follows a real one. */
  private parseNumber(): Value {
    const cursor = this.cursor;
    const start = cursor.position;
    const real = this.parseSignedNumber();
    if (real._tag === "Complex") return real;

    cursor.skipTrivia();
    const operator = cursor.peek();
    if (operator !== "+" && operator !== "-") return real;
    cursor.advance();
    cursor.skipTrivia();

    if (cursor.atEnd) {
      throw cursor.fail(
        "UnexpectedEndOfInput",
        `Expected an imaginary literal after "${operator}"`,
      );
    }
    const imagStart = cursor.position;
    const imag = isNumericStart(cursor) ? readNumber(cursor) : undefined;
    if (imag?._tag !== "Complex") {
      throw cursor.fail(
        "MalformedNumber",
        `Only an imaginary literal may follow "${operator}" in a complex number`,
        imagStart,
      );
    }

    const realPart = real._tag === "Integer" ? Number(real.value) : real.value;
    if (real._tag === "Integer" && !Number.isFinite(realPart)) {
      throw cursor.fail("MalformedNumber", "Integer is too large to convert to a float", start);
    }
    return Value.complex(realPart, operator === "-" ? -imag.imag : imag.imag);
  }

  private parseSignedNumber(): NumericValue {
    const cursor = this.cursor;
    const sign = cursor.peek();
    if (sign !== "+" && sign !== "-") return readNumber(cursor);

    cursor.advance();
    cursor.skipTrivia();
    if (cursor.atEnd) {
      throw cursor.fail("UnexpectedEndOfInput", `Expected a number after "${sign}"`);
    }
    if (!isNumericStart(cursor)) {
      throw cursor.fail(
        "MalformedNumber",
        `Expected a number after "${sign}" but found ${describeChar(cursor.peek())}`,
      );
    }
    const value = readNumber(cursor);
    return sign === "-" ? negate(value) : value;
  }

  private parseEmptySet(): Value {
    const cursor = this.cursor;
    const start = cursor.position;
    cursor.advance("set".length);
    cursor.skipTrivia();
    if (cursor.peek() === "(") {
      cursor.advance();
      cursor.skipTrivia();
      if (cursor.peek() === ")") {
        cursor.advance();
        return Value.set([]);
      }
    }
    throw cursor.fail(
      "UnexpectedToken",
      'Unexpected "set"; only the empty set() is a literal',
      start,
    );
  }

  /** `()` is the empty tuple, `(x)` is just `x`, and a comma anywhere makes a tuple. */
  private parseParenthesized(): Value {
    const cursor = this.cursor;
    const open = this.enter();
    cursor.skipTrivia();
    if (cursor.peek() === ")") {
      cursor.advance();
      this.leave();
      return Value.tuple([]);
    }

    const first = this.parseAtom();
    cursor.skipTrivia();
    if (cursor.peek() === ")") {
      cursor.advance();
      this.leave();
      return first;
    }
    if (cursor.peek() !== ",") {
      throw this.unexpectedInCollection("(", open);
    }
    cursor.advance();
    const items = this.parseSequenceTail("(", open, [first]);
    this.leave();
    return Value.tuple(items);
  }

  private parseList(): Value {
    const open = this.enter();
    const items = this.parseSequenceTail("[", open, []);
    this.leave();
    return Value.list(items);
  }

  /** Reads `item, item, ...` up to and including the closer; a trailing comma is allowed. */
  private parseSequenceTail(opener: string, open: number, items: Value[]): Value[] {
    const cursor = this.cursor;
    const closer = CLOSERS[opener];
    while (true) {
      cursor.skipTrivia();
      if (cursor.peek() === closer) {
        cursor.advance();
        return items;
      }

      items.push(this.parseAtom());
      cursor.skipTrivia();
      const next = cursor.peek();
      if (next === ",") {
        cursor.advance();
      } else if (next !== closer) {
        throw this.unexpectedInCollection(opener, open);
      }
    }
  }

  /** `{}` is an empty dict; the first entry decides between a dict and a set. */
  private parseBraces(): Value {
    const cursor = this.cursor;
    const open = this.enter();
    cursor.skipTrivia();
    if (cursor.peek() === "}") {
      cursor.advance();
      this.leave();
      return Value.dict([]);
    }

    const first = this.parseAtom();
    cursor.skipTrivia();
    const value =
      cursor.peek() === ":" ? this.parseDictTail(open, first) : this.parseSetTail(open, first);
    this.leave();
    return value;
  }

  private parseSetTail(open: number, first: Value): Value {
    const cursor = this.cursor;
    const items: Value[] = [first];
    while (true) {
      cursor.skipTrivia();
      const next = cursor.peek();
      if (next === ":") {
        throw cursor.fail("MalformedCollection", "Cannot mix set items and dictionary entries");
      }
      if (next === ",") {
        cursor.advance();
        cursor.skipTrivia();
        if (cursor.peek() !== "}") {
          items.push(this.parseAtom());
          continue;
        }
      } else if (next !== "}") {
        throw this.unexpectedInCollection("{", open);
      }
      cursor.advance();
      return Value.set(items);
    }
  }

  /** Entered with the cursor on the colon after `firstKey`. */
  private parseDictTail(open: number, firstKey: Value): Value {
    const cursor = this.cursor;
    const entries: DictEntry[] = [];
    let key = firstKey;
    while (true) {
      cursor.advance();
      entries.push([key, this.parseAtom()]);
      cursor.skipTrivia();
      const next = cursor.peek();
      if (next === ",") {
        cursor.advance();
        cursor.skipTrivia();
      } else if (next !== "}") {
        throw this.unexpectedInCollection("{", open);
      }
      if (cursor.peek() === "}") {
        cursor.advance();
        return Value.dict(entries);
      }

      key = this.parseAtom();
      cursor.skipTrivia();
      if (cursor.atEnd) {
        throw this.unexpectedInCollection("{", open);
      }
      if (cursor.peek() !== ":") {
        throw cursor.fail(
          "MalformedCollection",
          `Expected ":" after a dictionary key but found ${describeChar(cursor.peek())}`,
        );
      }
    }
  }

  /** Consumes an opening bracket and returns its offset. */
  private enter(): number {
    const open = this.cursor.position;
    this.depth += 1;
    if (this.depth > this.maxDepth) {
      throw this.cursor.fail(
        "NestingTooDeep",
        `Collections nest deeper than the limit of ${this.maxDepth}`,
        open,
      );
    }
    this.cursor.advance();
    return open;
  }

  private leave(): void {
    this.depth -= 1;
  }

  private unexpectedInCollection(opener: string, open: number): LiteralParseError {
    const cursor = this.cursor;
    const closer = CLOSERS[opener];
    if (cursor.atEnd) {
      return cursor.fail(
        "UnexpectedEndOfInput",
        `Expected "${closer}" to close "${opener}" opened at offset ${open}`,
      );
    }
    return cursor.fail(
      "MalformedCollection",
      `Expected "," or "${closer}" but found ${describeChar(cursor.peek())}`,
    );
  }
}

/** Parses literal text into a `Value`, throwing `LiteralParseError` on malformed input. */
export function parseLiteral(text: string, options?: ParseOptions): Value {
  const resolved = resolveParseOptions(options);
  const cursor = new Cursor(text, resolved.allowComments);
  return new LiteralParser(cursor, resolved.maxDepth).parseDocument();
}

export function parseLiteralEither(
  text: string,
  options?: ParseOptions,
): Either.Either<Value, LiteralParseError> {
  try {
    return Either.right(parseLiteral(text, options));
  } catch (error) {
    if (error instanceof LiteralParseError) {
      return Either.left(error);
    }
    throw error;
  }
}

export function safeParseLiteral(
  text: string,
  options?: ParseOptions,
): SafeParseResult<Value, LiteralParseError> {
  return Either.match(parseLiteralEither(text, options), {
    onLeft: (error) => ({ success: false, error }) as const,
    onRight: (data) => ({ success: true, data }) as const,
  });
}

/** Effectful `parseLiteral`. Outcomes are logged at debug level through Effect's logger. */
export function parseLiteralEffect(
  text: string,
  options?: ParseOptions,
): Effect.Effect<Value, LiteralParseError> {
  return Effect.suspend(() => parseLiteralEither(text, options)).pipe(
    Effect.tap((value) => Effect.logDebug(`Parsed a ${value._tag} literal`)),
    Effect.tapError((error) =>
      Effect.logDebug(`Rejected literal text (${error.kind}): ${error.message}`),
    ),
    Effect.annotateLogs({ inputLength: text.length }),
    Effect.withLogSpan("pyliteral.parse"),
  );
}
