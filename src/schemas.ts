import { Either, ParseResult, Schema } from "effect";

import { formatLiteral } from "./format.ts";
import { parseLiteralEither } from "./parse.ts";
import { isValue, type Value } from "./value.ts";

export const ValueSchema = Schema.declare((input: unknown): input is Value => isValue(input), {
  identifier: "Value",
  description: "a parsed literal value",
});

/** Literal text on the encoded side, a `Value` on the decoded side. */
export const LiteralFromString = Schema.transformOrFail(Schema.String, ValueSchema, {
  strict: true,
  decode: (text, _options, ast) =>
    Either.mapLeft(
      parseLiteralEither(text),
      (error) => new ParseResult.Type(ast, text, error.message),
    ),
  encode: (value) => ParseResult.succeed(formatLiteral(value)),
}).annotations({ identifier: "LiteralFromString" });

export function decodeLiteralText(text: string): Value {
  return Schema.decodeUnknownSync(LiteralFromString)(text);
}

export function encodeLiteralText(value: Value): string {
  return Schema.encodeSync(LiteralFromString)(value);
}
