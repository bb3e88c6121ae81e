import { Function } from "effect";

import { resolveFormatOptions, type FormatOptions } from "./options.ts";
import type { Value } from "./value.ts";

const NAMED_ESCAPES = new Map<number, string>([
  [0x5c, "\\\\"],
  [0x0a, "\\n"],
  [0x0d, "\\r"],
  [0x09, "\\t"],
]);

// Control, format, surrogate, private-use and unassigned code points, plus separators
// other than the plain space.
const UNPRINTABLE = /^[\p{C}\p{Z}]$/u;

/**
 * Renders a float the way the host language's `repr` does: the shortest digits that
 * round-trip, in fixed notation for decimal exponents in [-4, 16) and scientific
 * notation otherwise. Integral fixed values keep a `.0`.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return "nan";
  if (value === Infinity) return "inf";
  if (value === -Infinity) return "-inf";
  if (value === 0) return Object.is(value, -0) ? "-0.0" : "0.0";

  const sign = value < 0 ? "-" : "";
  const [mantissa, exponentText] = Math.abs(value).toExponential().split("e");
  const digits = mantissa.replace(".", "");
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= 16) {
    const significand = digits.length > 1 ? `${digits.slice(0, 1)}.${digits.slice(1)}` : digits;
    const magnitude = String(Math.abs(exponent)).padStart(2, "0");
    return `${sign}${significand}e${exponent < 0 ? "-" : "+"}${magnitude}`;
  }
  if (exponent < 0) {
    return `${sign}0.${"0".repeat(-exponent - 1)}${digits}`;
  }
  if (digits.length <= exponent + 1) {
    return `${sign}${digits.padEnd(exponent + 1, "0")}.0`;
  }
  return `${sign}${digits.slice(0, exponent + 1)}.${digits.slice(exponent + 1)}`;
}

/** `re±imj`; the real part is left out when it is +0 and the imaginary part is positive. */
export function formatComplex(real: number, imag: number): string {
  const imagNegative = imag < 0 || Object.is(imag, -0);
  const imagText = formatFloat(Math.abs(imag));
  if (Object.is(real, 0) && !imagNegative) {
    return `${imagText}j`;
  }
  return `${formatFloat(real)}${imagNegative ? "-" : "+"}${imagText}j`;
}

function hexEscape(codePoint: number): string {
  if (codePoint <= 0xff) return `\\x${codePoint.toString(16).padStart(2, "0")}`;
  if (codePoint <= 0xffff) return `\\u${codePoint.toString(16).padStart(4, "0")}`;
  return `\\U${codePoint.toString(16).padStart(8, "0")}`;
}

function quoteOf(options: Required<FormatOptions>): string {
  return options.quote === "single" ? "'" : '"';
}

export function formatString(value: string, options: Required<FormatOptions>): string {
  const quote = quoteOf(options);
  let out = quote;
  for (const char of value) {
    const codePoint = char.codePointAt(0) ?? 0;
    const named = NAMED_ESCAPES.get(codePoint);
    if (named !== undefined) {
      out += named;
    } else if (char === quote) {
      out += `\\${quote}`;
    } else if (codePoint === 0x20) {
      out += char;
    } else if (UNPRINTABLE.test(char) || (options.asciiOnly && codePoint > 0x7e)) {
      out += hexEscape(codePoint);
    } else {
      out += char;
    }
  }
  return out + quote;
}

export function formatBytes(
  value: ReadonlyArray<number>,
  options: Required<FormatOptions>,
): string {
  const quote = quoteOf(options);
  let out = `b${quote}`;
  for (const byte of value) {
    const named = NAMED_ESCAPES.get(byte);
    if (named !== undefined) {
      out += named;
    } else if (String.fromCharCode(byte) === quote) {
      out += `\\${quote}`;
    } else if (byte >= 0x20 && byte < 0x7f) {
      out += String.fromCharCode(byte);
    } else {
      out += hexEscape(byte);
    }
  }
  return out + quote;
}

function formatValue(value: Value, options: Required<FormatOptions>): string {
  const join = (items: ReadonlyArray<Value>) =>
    items.map((item) => formatValue(item, options)).join(", ");

  switch (value._tag) {
    case "None":
      return "None";
    case "Boolean":
      return value.value ? "True" : "False";
    case "Integer":
      return value.value.toString();
    case "Float":
      return formatFloat(value.value);
    case "Complex":
      return formatComplex(value.real, value.imag);
    case "Bytes":
      return formatBytes(value.value, options);
    case "String":
      return formatString(value.value, options);
    case "Tuple":
      return value.items.length === 1 ? `(${join(value.items)},)` : `(${join(value.items)})`;
    case "List":
      return `[${join(value.items)}]`;
    case "Set":
      // `{}` is an empty dict, so the empty set needs the call spelling.
      return value.items.length === 0 ? "set()" : `{${join(value.items)}}`;
    case "Dict":
      return `{${value.entries
        .map(([key, entry]) => `${formatValue(key, options)}: ${formatValue(entry, options)}`)
        .join(", ")}}`;
    default:
      return Function.absurd(value);
  }
}

/** Serializes a value to canonical literal text. Never fails. */
export function formatLiteral(value: Value, options?: FormatOptions): string {
  return formatValue(value, resolveFormatOptions(options));
}
