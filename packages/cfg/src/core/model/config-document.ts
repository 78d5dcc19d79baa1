import type { DocumentNotice } from "../../ports/document"
import type { Value } from "../../ports/value"
import { SectionNotFoundError, sectionHeader } from "../errors/cfg-errors"
import type { Section } from "./section"

/**
 * Parsed configuration file. Immutable; safe to hand to any number of
 * consumers at once.
 *
 * @example
 * ```ts
 * const doc = parse(text)
 *
 * doc.section("stepper_x").asString("step_pin")      // "PF0"
 * doc.section("extruder").asNumber("pid_Kp")         // 22.2
 * doc.findSection("heater_generic", "chamber")       // undefined when absent
 * ```
 */
export class ConfigDocument implements Iterable<Section> {
  readonly notices: readonly DocumentNotice[]

  private readonly list: readonly Section[]
  private readonly byHeader: ReadonlyMap<string, Section>

  constructor(sections: readonly Section[], notices: readonly DocumentNotice[] = []) {
    this.list = Object.freeze([...sections])
    this.notices = Object.freeze([...notices])
    // later duplicates overwrite earlier ones
    this.byHeader = new Map(this.list.map((s): [string, Section] => [s.header, s]))
  }

  get size(): number {
    return this.list.length
  }

  /** Every section in declaration order, duplicates included. Each call starts over. */
  sections(): IterableIterator<Section> {
    return this.list.values()
  }

  [Symbol.iterator](): IterableIterator<Section> {
    return this.sections()
  }

  /**
   * The section with exactly this type and instance name. Without
   * `instanceName` only a bare `[typeName]` header matches.
   *
   * @throws {SectionNotFoundError}
   */
  section(typeName: string, instanceName?: string): Section {
    const found = this.findSection(typeName, instanceName)
    if (!found) throw new SectionNotFoundError(typeName, instanceName)
    return found
  }

  findSection(typeName: string, instanceName?: string): Section | undefined {
    return this.byHeader.get(sectionHeader(typeName, instanceName))
  }

  hasSection(typeName: string, instanceName?: string): boolean {
    return this.byHeader.has(sectionHeader(typeName, instanceName))
  }

  /** All sections of one type, with or without instance names, in declaration order. */
  sectionsOfType(typeName: string): Section[] {
    return this.list.filter((s) => s.typeName === typeName)
  }

  /** @throws {MissingKeyError} */
  value(section: Section, key: string): Value {
    return section.value(key)
  }
}
