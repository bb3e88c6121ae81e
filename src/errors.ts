import { Data } from "effect";

export const PARSE_ERROR_KINDS = [
  "MalformedNumber",
  "MalformedString",
  "MalformedCollection",
  "UnexpectedToken",
  "TrailingInput",
  "UnexpectedEndOfInput",
  "NestingTooDeep",
] as const;
export type ParseErrorKind = (typeof PARSE_ERROR_KINDS)[number];

export interface SourcePosition {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export class LiteralParseError extends Data.TaggedError("LiteralParseError")<{
  readonly kind: ParseErrorKind;
  readonly message: string;
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}> {}

/** Line and column are 1-based; `\r\n`, `\r` and `\n` each end a line. */
export function locate(source: string, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  for (let index = 0; index < offset && index < source.length; index += 1) {
    const char = source[index];
    if (char === "\n" || (char === "\r" && source[index + 1] !== "\n")) {
      line += 1;
      lineStart = index + 1;
    }
  }
  return { offset, line, column: offset - lineStart + 1 };
}

export function createParseError(
  source: string,
  kind: ParseErrorKind,
  description: string,
  offset: number,
): LiteralParseError {
  const position = locate(source, offset);
  return new LiteralParseError({
    kind,
    message: `${description} at line ${position.line}, column ${position.column}`,
    ...position,
  });
}
