import { Function, Hash } from "effect";

import type { DictEntry, Value } from "./value.ts";

/**
 * Deep structural equality. Floats compare with `Object.is`, so `nan` equals `nan` and
 * `0.0` differs from `-0.0`. Sets compare without regard to order; every other
 * collection compares element by element.
 */
export function equals(left: Value, right: Value): boolean {
  if (left === right) return true;

  switch (left._tag) {
    case "None":
      return right._tag === "None";
    case "Boolean":
      return right._tag === "Boolean" && right.value === left.value;
    case "Integer":
      return right._tag === "Integer" && right.value === left.value;
    case "String":
      return right._tag === "String" && right.value === left.value;
    case "Float":
      return right._tag === "Float" && Object.is(left.value, right.value);
    case "Complex":
      return (
        right._tag === "Complex" &&
        Object.is(left.real, right.real) &&
        Object.is(left.imag, right.imag)
      );
    case "Bytes":
      return right._tag === "Bytes" && bytesEqual(left.value, right.value);
    case "Tuple":
    case "List":
      return (
        (right._tag === "Tuple" || right._tag === "List") &&
        right._tag === left._tag &&
        itemsEqual(left.items, right.items)
      );
    case "Set":
      return right._tag === "Set" && setItemsEqual(left.items, right.items);
    case "Dict":
      return right._tag === "Dict" && entriesEqual(left.entries, right.entries);
    default:
      return Function.absurd(left);
  }
}

function bytesEqual(left: ReadonlyArray<number>, right: ReadonlyArray<number>): boolean {
  return left.length === right.length && left.every((byte, index) => byte === right[index]);
}

function itemsEqual(left: ReadonlyArray<Value>, right: ReadonlyArray<Value>): boolean {
  return left.length === right.length && left.every((item, index) => equals(item, right[index]));
}

function setItemsEqual(left: ReadonlyArray<Value>, right: ReadonlyArray<Value>): boolean {
  if (left.length !== right.length) return false;
  const index = new ValueIndex<true>();
  for (const item of right) index.set(item, true);
  return left.every((item) => index.has(item));
}

function entriesEqual(left: ReadonlyArray<DictEntry>, right: ReadonlyArray<DictEntry>): boolean {
  return (
    left.length === right.length &&
    left.every(
      ([key, value], index) => equals(key, right[index][0]) && equals(value, right[index][1]),
    )
  );
}

/** Consistent with `equals`: structurally equal values hash alike. */
export function hashValue(value: Value): number {
  const tagged = (hash: number) => Hash.combine(hash)(Hash.string(value._tag));

  switch (value._tag) {
    case "None":
      return Hash.string(value._tag);
    case "Boolean":
      return tagged(value.value ? 1 : 0);
    case "Integer":
      return tagged(Hash.string(value.value.toString(16)));
    case "Float":
      return tagged(Hash.number(value.value));
    case "Complex":
      return tagged(Hash.combine(Hash.number(value.imag))(Hash.number(value.real)));
    case "Bytes":
      return tagged(value.value.reduce((hash, byte) => Hash.combine(byte)(hash), 0));
    case "String":
      return tagged(Hash.string(value.value));
    case "Tuple":
    case "List":
      return tagged(value.items.reduce((hash, item) => Hash.combine(hashValue(item))(hash), 0));
    case "Set":
      // Order-independent.
      return tagged(value.items.reduce((hash, item) => (hash + hashValue(item)) | 0, 0));
    case "Dict":
      return tagged(
        value.entries.reduce((hash, [key, entry]) => {
          const withKey = Hash.combine(hashValue(key))(hash);
          return Hash.combine(hashValue(entry))(withKey);
        }, 0),
      );
    default:
      return Function.absurd(value);
  }
}

/** A map keyed by structural equality. */
export class ValueIndex<T> {
  private readonly buckets = new Map<number, Array<{ key: Value; value: T }>>();

  get(key: Value): T | undefined {
    return this.find(key)?.value;
  }

  has(key: Value): boolean {
    return this.find(key) !== undefined;
  }

  set(key: Value, value: T): this {
    const existing = this.find(key);
    if (existing) {
      existing.value = value;
      return this;
    }

    const slot = { key, value };
    const hash = hashValue(key);
    const bucket = this.buckets.get(hash);
    if (bucket) {
      bucket.push(slot);
    } else {
      this.buckets.set(hash, [slot]);
    }
    return this;
  }

  private find(key: Value): { key: Value; value: T } | undefined {
    return this.buckets.get(hashValue(key))?.find((slot) => equals(slot.key, key));
  }
}
