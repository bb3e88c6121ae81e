import { describe, expect, test } from "vitest";

import { equals, hashValue, ValueIndex } from "./equality.ts";
import { Value } from "./value.ts";

describe("equals", () => {
  test("nan equals nan", () => {
    expect(equals(Value.float(NaN), Value.float(NaN))).toBe(true);
    expect(equals(Value.complex(NaN, 1), Value.complex(NaN, 1))).toBe(true);
  });

  test("signed zeros differ", () => {
    expect(equals(Value.float(0), Value.float(-0))).toBe(false);
    expect(equals(Value.complex(-0, 1), Value.complex(0, 1))).toBe(false);
  });

  test("variants never equal each other", () => {
    expect(equals(Value.integer(1), Value.float(1))).toBe(false);
    expect(equals(Value.integer(1), Value.boolean(true))).toBe(false);
    expect(equals(Value.tuple([]), Value.list([]))).toBe(false);
    expect(equals(Value.string("a"), Value.bytes([97]))).toBe(false);
  });

  test("bytes compare element-wise", () => {
    expect(equals(Value.bytes([1, 2]), Value.bytes([1, 2]))).toBe(true);
    expect(equals(Value.bytes([1, 2]), Value.bytes([2, 1]))).toBe(false);
  });

  test("lists are ordered", () => {
    const left = Value.list([Value.integer(1), Value.integer(2)]);
    expect(equals(left, Value.list([Value.integer(1), Value.integer(2)]))).toBe(true);
    expect(equals(left, Value.list([Value.integer(2), Value.integer(1)]))).toBe(false);
  });

  test("sets ignore order", () => {
    const left = Value.set([Value.integer(1), Value.string("a")]);
    const right = Value.set([Value.string("a"), Value.integer(1)]);
    expect(equals(left, right)).toBe(true);
    expect(equals(left, Value.set([Value.integer(1)]))).toBe(false);
  });

  test("dicts are ordered", () => {
    const one = Value.integer(1);
    const two = Value.integer(2);
    expect(equals(Value.dict([[one, two], [two, one]]), Value.dict([[one, two], [two, one]]))).toBe(
      true,
    );
    expect(equals(Value.dict([[one, two], [two, one]]), Value.dict([[two, one], [one, two]]))).toBe(
      false,
    );
  });

  test("compares nested structures deeply", () => {
    const build = () =>
      Value.dict([[Value.string("k"), Value.list([Value.tuple([Value.float(NaN)])])]]);
    expect(equals(build(), build())).toBe(true);
  });
});

describe("hashValue", () => {
  test("is stable for equal values", () => {
    const build = () => Value.tuple([Value.integer(10n ** 30n), Value.string("x")]);
    expect(hashValue(build())).toBe(hashValue(build()));
  });

  test("ignores set order", () => {
    const left = Value.set([Value.integer(1), Value.integer(2), Value.integer(3)]);
    const right = Value.set([Value.integer(3), Value.integer(1), Value.integer(2)]);
    expect(hashValue(left)).toBe(hashValue(right));
  });
});

describe("ValueIndex", () => {
  test("finds keys structurally", () => {
    const index = new ValueIndex<string>();
    index.set(Value.list([Value.integer(1)]), "first");
    expect(index.get(Value.list([Value.integer(1)]))).toBe("first");
    expect(index.has(Value.tuple([Value.integer(1)]))).toBe(false);
  });

  test("overwrites an existing key", () => {
    const index = new ValueIndex<number>();
    index.set(Value.string("k"), 1).set(Value.string("k"), 2);
    expect(index.get(Value.string("k"))).toBe(2);
  });
});
