import { describe, expect, test } from "vitest";

import { equals } from "./equality.ts";
import { formatFloat, formatLiteral } from "./format.ts";
import { parseLiteral } from "./parse.ts";
import { Value } from "./value.ts";

describe("formatFloat", () => {
  test.each([
    [1, "1.0"],
    [0.1, "0.1"],
    [-2.5, "-2.5"],
    [150, "150.0"],
    [0.0001, "0.0001"],
    [1.5e-5, "1.5e-05"],
    [123456789.123, "123456789.123"],
    [1e15, "1000000000000000.0"],
    [1e16, "1e+16"],
    [1e22, "1e+22"],
    [0, "0.0"],
    [-0, "-0.0"],
    [Infinity, "inf"],
    [-Infinity, "-inf"],
    [NaN, "nan"],
  ])("%s as %s", (value, expected) => {
    expect(formatFloat(value)).toBe(expected);
  });
});

describe("formatLiteral", () => {
  describe("scalars", () => {
    test("keywords and integers", () => {
      expect(formatLiteral(Value.none())).toBe("None");
      expect(formatLiteral(Value.boolean(true))).toBe("True");
      expect(formatLiteral(Value.boolean(false))).toBe("False");
      expect(formatLiteral(Value.integer(-42n))).toBe("-42");
      expect(formatLiteral(Value.integer(123456789012345678901234567890n))).toBe(
        "123456789012345678901234567890",
      );
    });

    test.each([
      [1, 3, "1.0+3.0j"],
      [1, -3, "1.0-3.0j"],
      [0, 3, "3.0j"],
      [0, -3, "0.0-3.0j"],
      [-0, -5, "-0.0-5.0j"],
      [-1, 0, "-1.0+0.0j"],
      [0, NaN, "nanj"],
    ])("complex(%d, %d) as %s", (real, imag, expected) => {
      expect(formatLiteral(Value.complex(real, imag))).toBe(expected);
    });
  });

  describe("strings", () => {
    test("escapes the delimiter and named controls", () => {
      expect(formatLiteral(Value.string('say "hi"\n'))).toBe(String.raw`"say \"hi\"\n"`);
      expect(formatLiteral(Value.string("a\tb\\c\r"))).toBe(String.raw`"a\tb\\c\r"`);
    });

    test("parsed escapes format back as escapes", () => {
      expect(formatLiteral(parseLiteral("'a\\nb'"))).toBe(String.raw`"a\nb"`);
    });

    test("single quotes on request", () => {
      expect(formatLiteral(Value.string("it's"), { quote: "single" })).toBe(String.raw`'it\'s'`);
      expect(formatLiteral(Value.string("it's"))).toBe(`"it's"`);
    });

    test("unprintable characters become hex escapes", () => {
      expect(formatLiteral(Value.string("\x07"))).toBe(String.raw`"\x07"`);
      expect(formatLiteral(Value.string("\x7f"))).toBe(String.raw`"\x7f"`);
      expect(formatLiteral(Value.string("\u00a0"))).toBe(String.raw`"\xa0"`);
    });

    test("printable unicode passes through", () => {
      expect(formatLiteral(Value.string("é😀"))).toBe(`"é😀"`);
    });

    test("asciiOnly escapes every non-ASCII code point", () => {
      expect(formatLiteral(Value.string("é\u1234😀"), { asciiOnly: true })).toBe(
        String.raw`"\xe9\u1234\U0001f600"`,
      );
    });

    test("mixed escapes with single quotes and asciiOnly", () => {
      const value = Value.string("hello\th\x03\xffo\x1bware\x07'y\u1234o\u{31234}u");
      expect(formatLiteral(value, { quote: "single", asciiOnly: true })).toBe(
        String.raw`'hello\th\x03\xffo\x1bware\x07\'y\u1234o\U00031234u'`,
      );
    });
  });

  describe("bytes", () => {
    test("printable ASCII stays, everything else is escaped", () => {
      expect(formatLiteral(Value.bytes([104, 105, 0, 255, 34, 92, 10]))).toBe(
        String.raw`b"hi\x00\xff\"\\\n"`,
      );
    });

    test("single quotes on request", () => {
      expect(formatLiteral(Value.bytes([39, 34]), { quote: "single" })).toBe(`b'\\'"'`);
    });
  });

  describe("collections", () => {
    test("tuples", () => {
      expect(formatLiteral(Value.tuple([]))).toBe("()");
      expect(formatLiteral(Value.tuple([Value.integer(1)]))).toBe("(1,)");
      expect(formatLiteral(Value.tuple([Value.integer(1), Value.integer(2)]))).toBe("(1, 2)");
    });

    test("lists", () => {
      expect(formatLiteral(Value.list([]))).toBe("[]");
      expect(formatLiteral(Value.list([Value.integer(1), Value.float(2)]))).toBe("[1, 2.0]");
    });

    test("sets", () => {
      expect(formatLiteral(Value.set([]))).toBe("set()");
      expect(formatLiteral(Value.set([Value.integer(1), Value.integer(2)]))).toBe("{1, 2}");
    });

    test("dicts", () => {
      expect(formatLiteral(Value.dict([]))).toBe("{}");
      expect(
        formatLiteral(
          Value.dict([
            [Value.integer(1), Value.integer(2)],
            [Value.string("foo"), Value.string("bar")],
          ]),
        ),
      ).toBe(`{1: 2, "foo": "bar"}`);
    });

    test("nested", () => {
      const value = Value.dict([
        [Value.string("foo"), Value.list([Value.integer(1), Value.boolean(true)])],
        [Value.set([Value.complex(2, 3)]), Value.integer(4)],
      ]);
      expect(formatLiteral(value)).toBe(`{"foo": [1, True], {2.0+3.0j}: 4}`);
    });
  });
});

describe("round trip", () => {
  const samples = [
    "None",
    "[True, False]",
    "-123456789012345678901234567890",
    "0x1A",
    "[0.1, -0.0, 1e16, 1.5e-05, 1e999, -inf, nan]",
    "[-5j, 1+nanj, 0.0-0.0j, -0.0+5j]",
    "'tab\\there \\x7f \\u00a0 é'",
    "'\\U0001f600 \u{1f600}'",
    "b'\\x00\\xff\\'\"'",
    "(1,)",
    "((), [], {}, set())",
    "{'descr': '<f8', 'fortran_order': False, 'shape': (3, 4), }",
    "{ 'foo': [5, (7e3,)], 2 - 5j: {b'bar'} }",
  ];

  test.each(samples)("parse(format(parse(%s))) equals the first parse", (text) => {
    const value = parseLiteral(text);
    expect(equals(parseLiteral(formatLiteral(value)), value)).toBe(true);
  });

  test.each(samples)("formatting %s is idempotent", (text) => {
    const once = formatLiteral(parseLiteral(text));
    expect(formatLiteral(parseLiteral(once))).toBe(once);
  });

  test.each([{ quote: "single" as const }, { asciiOnly: true }])(
    "round trips under %o",
    (options) => {
      const value = parseLiteral("['it\\'s', \"é\\n\", b'\"']");
      expect(equals(parseLiteral(formatLiteral(value, options)), value)).toBe(true);
    },
  );

  test("bytes in a set keep their contents after a write attempt", () => {
    const first = Value.bytes([97]);
    const set = Value.set([first, Value.bytes([98])]);
    Reflect.set(first.value, 0, 98);
    const text = formatLiteral(set);
    expect(text).toBe(`{b"a", b"b"}`);
    expect(equals(parseLiteral(text), set)).toBe(true);
  });

  test("array header formats canonically", () => {
    const header = parseLiteral("{'descr': '<f8', 'fortran_order': False, 'shape': (3, 4), }");
    expect(formatLiteral(header, { quote: "single" })).toBe(
      "{'descr': '<f8', 'fortran_order': False, 'shape': (3, 4)}",
    );
  });
});
