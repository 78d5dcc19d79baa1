import type { RatioPair, Value, ValueKind } from "../ports/value"

export type PlainValue = number | string | readonly number[] | readonly string[] | readonly RatioPair[]

export function isKind<K extends ValueKind>(value: Value, kind: K): value is Extract<Value, { kind: K }> {
  return value.kind === kind
}

/** Same variant and same payload, element by element. */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "number":
    case "string":
      return a.kind === b.kind && a.value === b.value
    case "number_array":
      return b.kind === "number_array" && sameItems(a.value, b.value)
    case "string_array":
      return b.kind === "string_array" && sameItems(a.value, b.value)
    case "ratio":
      return (
        b.kind === "ratio" &&
        a.value.length === b.value.length &&
        a.value.every(([n, d], i) => n === b.value[i]?.[0] && d === b.value[i]?.[1])
      )
  }
}

function sameItems<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((item, i) => item === b[i])
}

/** Drops the variant tag. Used where settings go through a schema validator. */
export function toPlain(value: Value): PlainValue {
  return value.value
}

/**
 * Overall multiplier of a gear train: the product of every
 * `numerator / denominator`. `80:16, 3:1` gives 15.
 */
export function ratioFactor(pairs: readonly RatioPair[]): number {
  return pairs.reduce((factor, [numerator, denominator]) => factor * (numerator / denominator), 1)
}
