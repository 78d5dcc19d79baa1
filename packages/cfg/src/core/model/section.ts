import type { SectionEntry } from "../../ports/document"
import type { SourceSpan } from "../../ports/source-span"
import type { RatioPair, Value, ValueKind, ValueOf } from "../../ports/value"
import { MissingKeyError, sectionHeader, TypeMismatchError } from "../errors/cfg-errors"
import { isKind } from "../values"

export type SectionInit = {
  typeName: string
  instanceName?: string
  /** Already de-duplicated, in declaration order. */
  entries: Iterable<SectionEntry>
  span: SourceSpan
}

/**
 * One `[type instance]` block. Keys iterate in declaration order; lookups go
 * through a `Map`, which keeps that order.
 *
 * Every typed accessor throws {@link MissingKeyError} when the key is absent
 * and no fallback was given, and {@link TypeMismatchError} when the value was
 * written in another shape. A fallback never hides a mismatch.
 */
export class Section implements Iterable<SectionEntry> {
  readonly typeName: string
  readonly instanceName: string | undefined
  readonly span: SourceSpan

  private readonly entries: ReadonlyMap<string, SectionEntry>

  constructor(init: SectionInit) {
    this.typeName = init.typeName
    this.instanceName = init.instanceName
    this.span = init.span
    this.entries = new Map(
      [...init.entries].map((entry): [string, SectionEntry] => [entry.key, entry]),
    )
  }

  /** `stepper_x`, or `heater_generic chamber` when there is an instance name. */
  get header(): string {
    return sectionHeader(this.typeName, this.instanceName)
  }

  get size(): number {
    return this.entries.size
  }

  keys(): IterableIterator<string> {
    return this.entries.keys()
  }

  [Symbol.iterator](): IterableIterator<SectionEntry> {
    return this.entries.values()
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  entry(key: string): SectionEntry | undefined {
    return this.entries.get(key)
  }

  get(key: string): Value | undefined {
    return this.entries.get(key)?.value
  }

  value(key: string): Value {
    const value = this.get(key)
    if (value === undefined) throw new MissingKeyError(this.header, key)
    return value
  }

  asNumber(key: string, fallback?: number): number {
    return this.typed(key, "number", fallback)
  }

  asRatio(key: string, fallback?: readonly RatioPair[]): readonly RatioPair[] {
    return this.typed(key, "ratio", fallback)
  }

  asNumberArray(key: string, fallback?: readonly number[]): readonly number[] {
    return this.typed(key, "number_array", fallback)
  }

  asString(key: string, fallback?: string): string {
    return this.typed(key, "string", fallback)
  }

  asStringArray(key: string, fallback?: readonly string[]): readonly string[] {
    return this.typed(key, "string_array", fallback)
  }

  private typed<K extends ValueKind>(key: string, kind: K, fallback?: ValueOf<K>): ValueOf<K> {
    const value = this.get(key)

    if (value === undefined) {
      if (fallback !== undefined) return fallback
      throw new MissingKeyError(this.header, key)
    }

    if (!isKind(value, kind)) {
      throw new TypeMismatchError(this.header, key, kind, value.kind)
    }

    return value.value
  }
}
