import { Option } from "effect";

import { equals, ValueIndex } from "./equality.ts";

export interface NoneValue {
  readonly _tag: "None";
}

export interface BooleanValue {
  readonly _tag: "Boolean";
  readonly value: boolean;
}

export interface IntegerValue {
  readonly _tag: "Integer";
  readonly value: bigint;
}

export interface FloatValue {
  readonly _tag: "Float";
  readonly value: number;
}

export interface ComplexValue {
  readonly _tag: "Complex";
  readonly real: number;
  readonly imag: number;
}

/** Byte values in 0..255, held in a frozen array. */
export interface BytesValue {
  readonly _tag: "Bytes";
  readonly value: ReadonlyArray<number>;
}

/** Unicode scalar values only; lone surrogates are rejected on construction. */
export interface StringValue {
  readonly _tag: "String";
  readonly value: string;
}

export interface TupleValue {
  readonly _tag: "Tuple";
  readonly items: ReadonlyArray<Value>;
}

export interface ListValue {
  readonly _tag: "List";
  readonly items: ReadonlyArray<Value>;
}

/** Items are distinct under structural equality and keep their first-seen order. */
export interface SetValue {
  readonly _tag: "Set";
  readonly items: ReadonlyArray<Value>;
}

/** Keys are distinct under structural equality and keep their first-seen order. */
export interface DictValue {
  readonly _tag: "Dict";
  readonly entries: ReadonlyArray<DictEntry>;
}

export type DictEntry = readonly [key: Value, value: Value];

export type Value =
  | NoneValue
  | BooleanValue
  | IntegerValue
  | FloatValue
  | ComplexValue
  | BytesValue
  | StringValue
  | TupleValue
  | ListValue
  | SetValue
  | DictValue;

export const VALUE_TAGS = [
  "None",
  "Boolean",
  "Integer",
  "Float",
  "Complex",
  "Bytes",
  "String",
  "Tuple",
  "List",
  "Set",
  "Dict",
] as const;
export type ValueTag = (typeof VALUE_TAGS)[number];

export type SequenceValue = TupleValue | ListValue | SetValue;

const LONE_SURROGATE = /\p{Cs}/u;

const NONE: NoneValue = Object.freeze({ _tag: "None" });
const TRUE: BooleanValue = Object.freeze({ _tag: "Boolean", value: true });
const FALSE: BooleanValue = Object.freeze({ _tag: "Boolean", value: false });

function none(): NoneValue {
  return NONE;
}

function boolean(value: boolean): BooleanValue {
  return value ? TRUE : FALSE;
}

function integer(value: bigint | number): IntegerValue {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new RangeError(`Expected a safe integer, received ${value}`);
  }
  return Object.freeze({ _tag: "Integer", value: BigInt(value) });
}

function float(value: number): FloatValue {
  return Object.freeze({ _tag: "Float", value });
}

function complex(real: number, imag: number): ComplexValue {
  return Object.freeze({ _tag: "Complex", real, imag });
}

function bytes(value: Uint8Array | ReadonlyArray<number>): BytesValue {
  for (const byte of value) {
    if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
      throw new RangeError(`Byte values must be integers in 0..255, received ${byte}`);
    }
  }
  return Object.freeze({ _tag: "Bytes", value: Object.freeze(Array.from(value)) });
}

function string(value: string): StringValue {
  const surrogate = LONE_SURROGATE.exec(value);
  if (surrogate) {
    throw new RangeError(
      `Strings may not contain a lone surrogate, found one at index ${surrogate.index}`,
    );
  }
  return Object.freeze({ _tag: "String", value });
}

function tuple(items: Iterable<Value>): TupleValue {
  return Object.freeze({ _tag: "Tuple", items: Object.freeze([...items]) });
}

function list(items: Iterable<Value>): ListValue {
  return Object.freeze({ _tag: "List", items: Object.freeze([...items]) });
}

function set(items: Iterable<Value>): SetValue {
  const seen = new ValueIndex<true>();
  const distinct: Value[] = [];
  for (const item of items) {
    if (seen.has(item)) continue;
    seen.set(item, true);
    distinct.push(item);
  }
  return Object.freeze({ _tag: "Set", items: Object.freeze(distinct) });
}

function dict(entries: Iterable<DictEntry>): DictValue {
  const positions = new ValueIndex<number>();
  const merged: DictEntry[] = [];
  for (const [key, value] of entries) {
    const position = positions.get(key);
    if (position === undefined) {
      positions.set(key, merged.length);
      merged.push(Object.freeze([key, value] as const));
    } else {
      merged[position] = Object.freeze([merged[position][0], value] as const);
    }
  }
  return Object.freeze({ _tag: "Dict", entries: Object.freeze(merged) });
}

/** Constructors for every variant. Collections copy their input and freeze the copy. */
export const Value = {
  none,
  boolean,
  integer,
  float,
  complex,
  bytes,
  string,
  tuple,
  list,
  set,
  dict,
} as const;

export function isValue(input: unknown): input is Value {
  if (typeof input !== "object" || input === null || !("_tag" in input)) {
    return false;
  }
  const tag: unknown = input._tag;
  return typeof tag === "string" && VALUE_TAGS.some((candidate) => candidate === tag);
}

export const isNone = (value: Value): value is NoneValue => value._tag === "None";
export const isBoolean = (value: Value): value is BooleanValue => value._tag === "Boolean";
export const isInteger = (value: Value): value is IntegerValue => value._tag === "Integer";
export const isFloat = (value: Value): value is FloatValue => value._tag === "Float";
export const isComplex = (value: Value): value is ComplexValue => value._tag === "Complex";
export const isBytes = (value: Value): value is BytesValue => value._tag === "Bytes";
export const isString = (value: Value): value is StringValue => value._tag === "String";
export const isTuple = (value: Value): value is TupleValue => value._tag === "Tuple";
export const isList = (value: Value): value is ListValue => value._tag === "List";
export const isSet = (value: Value): value is SetValue => value._tag === "Set";
export const isDict = (value: Value): value is DictValue => value._tag === "Dict";

export const getBoolean = (value: Value): Option.Option<boolean> =>
  isBoolean(value) ? Option.some(value.value) : Option.none();

export const getInteger = (value: Value): Option.Option<bigint> =>
  isInteger(value) ? Option.some(value.value) : Option.none();

export const getFloat = (value: Value): Option.Option<number> =>
  isFloat(value) ? Option.some(value.value) : Option.none();

export const getComplex = (
  value: Value,
): Option.Option<{ readonly real: number; readonly imag: number }> =>
  isComplex(value) ? Option.some({ real: value.real, imag: value.imag }) : Option.none();

/** Returns a copy, so the stored bytes stay untouched. */
export const getBytes = (value: Value): Option.Option<Uint8Array> =>
  isBytes(value) ? Option.some(Uint8Array.from(value.value)) : Option.none();

export const getString = (value: Value): Option.Option<string> =>
  isString(value) ? Option.some(value.value) : Option.none();

const isSequence = (value: Value): value is SequenceValue =>
  isTuple(value) || isList(value) || isSet(value);

export const getItems = (value: Value): Option.Option<ReadonlyArray<Value>> =>
  isSequence(value) ? Option.some(value.items) : Option.none();

export const getEntries = (value: Value): Option.Option<ReadonlyArray<DictEntry>> =>
  isDict(value) ? Option.some(value.entries) : Option.none();

export function lookup(value: Value, key: Value): Option.Option<Value> {
  if (!isDict(value)) {
    return Option.none();
  }
  const entry = value.entries.find(([entryKey]) => equals(entryKey, key));
  return entry === undefined ? Option.none() : Option.some(entry[1]);
}
