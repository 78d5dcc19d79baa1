import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  readonly value: Readonly<T>

  constructor(
    data: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly suppliedKeys: ReadonlySet<string>,
  ) {
    this.value = Object.freeze({ ...data })
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.value[key]
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.value).filter((key): key is keyof T & string => key in this.value)
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.keys().map((key) => this.explain(key)))]
  }

  unknownKeys(): string[] {
    const known = new Set<string>(this.keys())

    return [...this.suppliedKeys].filter((key) => !known.has(key))
  }
}
