import { Value, type BytesValue, type StringValue } from "../value.ts";
import type { Cursor } from "./cursor.ts";

interface Prefix {
  readonly raw: boolean;
  readonly bytes: boolean;
}

type Piece =
  | { readonly kind: "String"; readonly text: string }
  | { readonly kind: "Bytes"; readonly bytes: ReadonlyArray<number> };

const SIMPLE_ESCAPES = new Map<string, number>([
  ["\\", 0x5c],
  ["'", 0x27],
  ['"', 0x22],
  ["a", 0x07],
  ["b", 0x08],
  ["f", 0x0c],
  ["n", 0x0a],
  ["r", 0x0d],
  ["t", 0x09],
  ["v", 0x0b],
]);

const OCTAL_DIGIT = /^[0-7]$/;
const HEX_DIGIT = /^[0-9a-fA-F]$/;
const MAX_CODE_POINT = 0x10ffff;

function isQuote(char: string): boolean {
  return char === "'" || char === '"';
}

/** A quote, optionally preceded by an identifier-shaped prefix such as `rb`. */
export function isTextStart(cursor: Cursor): boolean {
  return isQuote(cursor.peek(cursor.peekWord().length));
}

/**
 * Reads a string or bytes literal, concatenating any literals of the same kind that follow
 * it with only whitespace or comments in between.
 */
export function readText(cursor: Cursor): StringValue | BytesValue {
  const first = readPiece(cursor);
  const texts: string[] = [];
  const bytes: number[] = [];
  const collect = (piece: Piece) => {
    if (piece.kind === "String") texts.push(piece.text);
    else for (const byte of piece.bytes) bytes.push(byte);
  };
  collect(first);

  while (true) {
    cursor.skipTrivia();
    if (!isTextStart(cursor)) break;
    const start = cursor.position;
    const piece = readPiece(cursor);
    if (piece.kind !== first.kind) {
      throw cursor.fail("MalformedString", "Cannot concatenate string and bytes literals", start);
    }
    collect(piece);
  }

  return first.kind === "String" ? Value.string(texts.join("")) : Value.bytes(bytes);
}

function readPrefix(cursor: Cursor): Prefix {
  const start = cursor.position;
  const word = cursor.peekWord();
  cursor.advance(word.length);
  switch (word.toLowerCase()) {
    case "":
    case "u":
      return { raw: false, bytes: false };
    case "r":
      return { raw: true, bytes: false };
    case "b":
      return { raw: false, bytes: true };
    case "rb":
    case "br":
      return { raw: true, bytes: true };
    default:
      throw cursor.fail("MalformedString", `Unsupported string prefix "${word}"`, start);
  }
}

function readPiece(cursor: Cursor): Piece {
  const start = cursor.position;
  const prefix = readPrefix(cursor);
  const quote = cursor.peek();
  const triple = cursor.startsWith(quote.repeat(3));
  const delimiter = triple ? quote.repeat(3) : quote;
  cursor.advance(delimiter.length);

  const codePoints: number[] = [];
  const unterminated = () =>
    cursor.fail("MalformedString", "Unterminated string literal", start);

  while (true) {
    if (cursor.atEnd) throw unterminated();
    if (cursor.startsWith(delimiter)) {
      cursor.advance(delimiter.length);
      break;
    }

    const char = cursor.peek();
    if (!triple && (char === "\n" || char === "\r")) throw unterminated();

    if (char === "\\") {
      if (prefix.raw) {
        // Raw literals keep the backslash and whatever it protects.
        codePoints.push(0x5c);
        cursor.advance();
        if (cursor.atEnd) throw unterminated();
      } else {
        readEscape(cursor, prefix.bytes, codePoints);
        continue;
      }
    }

    const codePoint = cursor.peekCodePoint();
    if (codePoint >= 0xd800 && codePoint <= 0xdfff) {
      throw cursor.fail("MalformedString", "Lone surrogate in string literal");
    }
    if (prefix.bytes && codePoint > 0x7f) {
      throw cursor.fail("MalformedString", "Bytes literals may only contain ASCII characters");
    }
    codePoints.push(codePoint);
    cursor.advance(codePoint > 0xffff ? 2 : 1);
  }

  if (prefix.bytes) {
    return { kind: "Bytes", bytes: codePoints };
  }
  return { kind: "String", text: fromCodePoints(codePoints) };
}

function fromCodePoints(codePoints: ReadonlyArray<number>): string {
  let text = "";
  for (const codePoint of codePoints) {
    text += String.fromCodePoint(codePoint);
  }
  return text;
}

/** Decodes the escape at the cursor (which sits on the backslash) into `out`. */
function readEscape(cursor: Cursor, bytes: boolean, out: number[]): void {
  const start = cursor.position;
  cursor.advance();
  const char = cursor.peek();
  const invalid = (reason: string) => cursor.fail("MalformedString", reason, start);

  if (char === "") {
    throw invalid("Unterminated string literal");
  }

  if (char === "\n" || char === "\r") {
    cursor.advance(char === "\r" && cursor.peek(1) === "\n" ? 2 : 1);
    return;
  }

  const simple = SIMPLE_ESCAPES.get(char);
  if (simple !== undefined) {
    cursor.advance();
    out.push(simple);
    return;
  }

  if (OCTAL_DIGIT.test(char)) {
    let digits = "";
    while (digits.length < 3 && OCTAL_DIGIT.test(cursor.peek())) {
      digits += cursor.peek();
      cursor.advance();
    }
    const value = Number.parseInt(digits, 8);
    if (bytes && value > 0xff) {
      throw invalid(`Octal escape "\\${digits}" is out of range for bytes`);
    }
    out.push(value);
    return;
  }

  if (char === "x" || (!bytes && (char === "u" || char === "U"))) {
    const width = char === "x" ? 2 : char === "u" ? 4 : 8;
    cursor.advance();
    let digits = "";
    while (digits.length < width && HEX_DIGIT.test(cursor.peek())) {
      digits += cursor.peek();
      cursor.advance();
    }
    if (digits.length < width) {
      throw invalid(`Escape "\\${char}" needs exactly ${width} hex digits`);
    }
    const value = Number.parseInt(digits, 16);
    if (value > MAX_CODE_POINT) {
      throw invalid(`Escape "\\${char}${digits}" is beyond U+10FFFF`);
    }
    if (value >= 0xd800 && value <= 0xdfff) {
      throw invalid(`Escape "\\${char}${digits}" is a surrogate, not a Unicode scalar value`);
    }
    out.push(value);
    return;
  }

  if (char === "N" && !bytes) {
    throw invalid("Named Unicode escapes are not supported");
  }

  throw invalid(`Invalid escape sequence "\\${char}" in ${bytes ? "bytes" : "string"} literal`);
}
