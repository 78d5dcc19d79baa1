export type RatioPair = readonly [numerator: number, denominator: number]

export type NumberValue = { readonly kind: "number"; readonly value: number }
export type RatioValue = { readonly kind: "ratio"; readonly value: readonly RatioPair[] }
export type NumberArrayValue = { readonly kind: "number_array"; readonly value: readonly number[] }
export type StringValue = { readonly kind: "string"; readonly value: string }
export type StringArrayValue = { readonly kind: "string_array"; readonly value: readonly string[] }

/**
 * A resolved configuration value. The variant is fixed when the value is built
 * and never reinterpreted: `"16"` written in a file is a `number`, and asking
 * for it as a string is a type mismatch.
 */
export type Value = NumberValue | RatioValue | NumberArrayValue | StringValue | StringArrayValue

export type ValueKind = Value["kind"]

/** Maps a kind to the payload its accessor returns. */
export type ValueOf<K extends ValueKind> = Extract<Value, { kind: K }>["value"]

export const Value = {
  number: (value: number): NumberValue => ({ kind: "number", value }),
  ratio: (pairs: readonly RatioPair[]): RatioValue => ({
    kind: "ratio",
    value: Object.freeze(pairs.map(([n, d]): RatioPair => Object.freeze([n, d] as const))),
  }),
  numberArray: (items: readonly number[]): NumberArrayValue => ({
    kind: "number_array",
    value: Object.freeze([...items]),
  }),
  string: (value: string): StringValue => ({ kind: "string", value }),
  stringArray: (items: readonly string[]): StringArrayValue => ({
    kind: "string_array",
    value: Object.freeze([...items]),
  }),
} as const
