export { equals, hashValue, ValueIndex } from "./equality.ts";
export { LiteralParseError, PARSE_ERROR_KINDS, type ParseErrorKind } from "./errors.ts";
export { formatFloat, formatLiteral } from "./format.ts";
export type { FormatOptions, ParseOptions, QuoteStyle } from "./options.ts";
export { parseLiteral, parseLiteralEffect, parseLiteralEither, safeParseLiteral } from "./parse.ts";
export type { SafeParseFailure, SafeParseResult, SafeParseSuccess } from "./parse.ts";
export { decodeLiteralText, encodeLiteralText, LiteralFromString, ValueSchema } from "./schemas.ts";
export * from "./value.ts";
