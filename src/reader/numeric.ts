import { Value, type ComplexValue, type FloatValue, type IntegerValue } from "../value.ts";
import { describeChar, type Cursor } from "./cursor.ts";

export type NumericValue = IntegerValue | FloatValue | ComplexValue;

const DECIMAL_DIGIT = /^[0-9]$/;
const IDENTIFIER_CHAR = /^[A-Za-z0-9_]$/;

const RADIXES = {
  b: { name: "binary", prefix: "0b", digit: /^[01]$/ },
  o: { name: "octal", prefix: "0o", digit: /^[0-7]$/ },
  x: { name: "hexadecimal", prefix: "0x", digit: /^[0-9a-fA-F]$/ },
} as const;
type RadixKey = keyof typeof RADIXES;

const SPECIAL_FLOATS = new Map<string, number>([
  ["inf", Infinity],
  ["nan", NaN],
]);

interface SpecialFloat {
  readonly word: string;
  readonly value: number;
  readonly imaginary: boolean;
}

function isRadixKey(char: string): char is RadixKey {
  return char === "b" || char === "o" || char === "x";
}

/** `inf`, `nan`, `infj` or `nanj` at the cursor, as spelled by the host language's `repr`. */
function peekSpecialFloat(cursor: Cursor): SpecialFloat | undefined {
  const word = cursor.peekWord();
  const imaginary = word.endsWith("j");
  const base = imaginary ? word.slice(0, -1) : word;
  const value = SPECIAL_FLOATS.get(base);
  return value === undefined ? undefined : { word, value, imaginary };
}

export function isNumericStart(cursor: Cursor): boolean {
  const char = cursor.peek();
  if (DECIMAL_DIGIT.test(char)) return true;
  if (char === "." && DECIMAL_DIGIT.test(cursor.peek(1))) return true;
  return peekSpecialFloat(cursor) !== undefined;
}

/**
 * Reads one unsigned numeric literal. Underscores may separate digits but may not lead,
 * trail or repeat. A literal running straight into an identifier character is malformed.
 */
export function readNumber(cursor: Cursor): NumericValue {
  const start = cursor.position;
  const special = peekSpecialFloat(cursor);
  if (special) {
    cursor.advance(special.word.length);
    return special.imaginary ? Value.complex(0, special.value) : Value.float(special.value);
  }

  const radixChar = cursor.peek(1).toLowerCase();
  const value =
    cursor.peek() === "0" && isRadixKey(radixChar)
      ? readRadixInteger(cursor, radixChar, start)
      : readDecimal(cursor, start);

  if (IDENTIFIER_CHAR.test(cursor.peek())) {
    throw cursor.fail(
      "MalformedNumber",
      `Invalid character ${describeChar(cursor.peek())} in numeric literal`,
    );
  }

  return value;
}

function readDigits(cursor: Cursor, digit: RegExp, allowLeadingUnderscore: boolean): string {
  let digits = "";
  while (true) {
    const char = cursor.peek();
    if (char === "_") {
      if ((digits.length === 0 && !allowLeadingUnderscore) || !digit.test(cursor.peek(1))) {
        throw cursor.fail("MalformedNumber", "Underscores must sit between two digits");
      }
      cursor.advance();
      continue;
    }
    if (!digit.test(char)) {
      return digits;
    }
    digits += char;
    cursor.advance();
  }
}

function readRadixInteger(cursor: Cursor, radixChar: RadixKey, start: number): IntegerValue {
  const radix = RADIXES[radixChar];
  cursor.advance(2);
  const digits = readDigits(cursor, radix.digit, true);
  if (digits.length === 0) {
    throw cursor.fail(
      "MalformedNumber",
      `Expected ${radix.name} digits after "${radix.prefix}"`,
      start,
    );
  }
  return Value.integer(BigInt(`${radix.prefix}${digits}`));
}

function readDecimal(cursor: Cursor, start: number): NumericValue {
  const integerPart = readDigits(cursor, DECIMAL_DIGIT, false);
  let text = integerPart;
  let isFloat = false;

  if (cursor.peek() === ".") {
    cursor.advance();
    isFloat = true;
    text += `.${readDigits(cursor, DECIMAL_DIGIT, false)}`;
  }

  const exponentMarker = cursor.peek();
  if (exponentMarker === "e" || exponentMarker === "E") {
    cursor.advance();
    let sign = "";
    if (cursor.peek() === "+" || cursor.peek() === "-") {
      sign = cursor.peek();
      cursor.advance();
    }
    const exponent = readDigits(cursor, DECIMAL_DIGIT, false);
    if (exponent.length === 0) {
      throw cursor.fail("MalformedNumber", "Exponent has no digits");
    }
    isFloat = true;
    text += `e${sign}${exponent}`;
  }

  const suffix = cursor.peek();
  if (suffix === "j" || suffix === "J") {
    cursor.advance();
    return Value.complex(0, Number(text));
  }

  if (isFloat) {
    return Value.float(Number(text));
  }

  if (integerPart.length > 1 && integerPart.startsWith("0") && !/^0+$/.test(integerPart)) {
    throw cursor.fail(
      "MalformedNumber",
      "Leading zeros are not permitted in decimal integer literals; use an 0o prefix for octal",
      start,
    );
  }
  return Value.integer(BigInt(integerPart));
}
