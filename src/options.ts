export interface ParseOptions {
  /** Deepest collection nesting accepted before failing with `NestingTooDeep`. Defaults to 200. */
  maxDepth?: number;
  /** Whether `#` starts a comment running to the end of the line. Defaults to true. */
  allowComments?: boolean;
}

export type QuoteStyle = "double" | "single";

export interface FormatOptions {
  /** Delimiter for string and bytes literals. Defaults to `"double"`. */
  quote?: QuoteStyle;
  /** Escape every non-ASCII code point. Defaults to false. */
  asciiOnly?: boolean;
}

export const DEFAULT_MAX_DEPTH = 200;

export function resolveParseOptions(options: ParseOptions | undefined): Required<ParseOptions> {
  const maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, received ${maxDepth}`);
  }

  return {
    maxDepth,
    allowComments: options?.allowComments ?? true,
  };
}

export function resolveFormatOptions(options: FormatOptions | undefined): Required<FormatOptions> {
  return {
    quote: options?.quote ?? "double",
    asciiOnly: options?.asciiOnly ?? false,
  };
}
