import { VersionError } from "./errors.js";
import {
  compareIdentifiers,
  incrementNumeric,
  parseIdentifiers,
  type Identifier,
} from "./identifier.js";

export class Prerelease {
  static readonly EMPTY = new Prerelease([]);

  readonly identifiers: readonly Identifier[];

  private constructor(identifiers: readonly Identifier[]) {
    this.identifiers = Object.freeze([...identifiers]);
  }

  static parse(input: string): Prerelease {
    const identifiers = parseIdentifiers(input);
    return identifiers.length === 0 ? Prerelease.EMPTY : new Prerelease(identifiers);
  }

  static of(identifiers: readonly Identifier[]): Prerelease {
    return identifiers.length === 0 ? Prerelease.EMPTY : new Prerelease(identifiers);
  }

  isEmpty(): boolean {
    return this.identifiers.length === 0;
  }

  /**
   * Field-by-field comparison. When every shared field is equal the longer
   * sequence ranks higher. An empty prerelease is just the shortest sequence
   * here; callers comparing full versions rank "no prerelease" above any.
   */
  compare(other: Prerelease): number {
    const shared = Math.min(this.identifiers.length, other.identifiers.length);
    for (let i = 0; i < shared; i += 1) {
      const order = compareIdentifiers(this.identifiers[i], other.identifiers[i]);
      if (order !== 0) return order;
    }
    return Math.sign(this.identifiers.length - other.identifiers.length);
  }

  equals(other: Prerelease): boolean {
    return this.toString() === other.toString();
  }

  /** Increments the last field, which must be numeric. */
  incrementLast(): Prerelease {
    const text = this.toString();
    const last = this.identifiers.at(-1);
    if (!last) {
      throw new VersionError(
        { kind: "prerelease-not-set", version: text },
        "Prerelease not set.",
      );
    }

    if (last.kind !== "numeric") {
      const start = text.length - last.text.length;
      throw new VersionError(
        { kind: "non-numeric-prerelease", prerelease: text, span: { start, end: text.length } },
        `Cannot bump prerelease "${text}": last field "${last.text}" (${start}..${text.length}) is not numeric.`,
      );
    }

    return new Prerelease([...this.identifiers.slice(0, -1), incrementNumeric(last)]);
  }

  toString(): string {
    return this.identifiers.map((identifier) => identifier.text).join(".");
  }
}
