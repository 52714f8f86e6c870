import { VersionError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type NumericIdentifier = {
  readonly kind: "numeric";
  readonly text: string;
  readonly value: number;
};

export type AlphanumericIdentifier = {
  readonly kind: "alphanumeric";
  readonly text: string;
};

export type Identifier = NumericIdentifier | AlphanumericIdentifier;

const ALL_DIGITS = /^[0-9]+$/;
const IDENTIFIER_CHAR = /^[0-9A-Za-z-]$/;

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parses one dot-separated field. `offset` is where the field starts inside the
 * full text so that invalid characters report their position in that text.
 */
export function parseIdentifier(field: string, offset = 0, input = field): Identifier {
  if (field.length === 0) {
    throw new VersionError(
      { kind: "empty-identifier", input },
      `Empty identifier in "${input}" at index ${offset}.`,
    );
  }

  assertIdentifierChars(field, offset, input);

  if (!ALL_DIGITS.test(field)) {
    return { kind: "alphanumeric", text: field };
  }

  if (field.length > 1 && field.startsWith("0")) {
    throw new VersionError(
      { kind: "leading-zero", input, index: offset },
      `Numeric identifier "${field}" in "${input}" has a leading zero.`,
    );
  }

  const value = Number(field);
  if (!Number.isSafeInteger(value)) {
    throw new VersionError(
      { kind: "numeric-overflow", input },
      `Numeric identifier "${field}" in "${input}" is too large.`,
    );
  }

  return { kind: "numeric", text: field, value };
}

/** Splits on "." and parses every field; an empty string yields no identifiers. */
export function parseIdentifiers(input: string): Identifier[] {
  if (input.length === 0) return [];

  const identifiers: Identifier[] = [];
  let offset = 0;
  for (const field of input.split(".")) {
    identifiers.push(parseIdentifier(field, offset, input));
    offset += field.length + 1;
  }
  return identifiers;
}

export function assertIdentifierChars(field: string, offset: number, input: string): void {
  for (let index = 0; index < field.length; index += 1) {
    const character = field.charAt(index);
    if (!IDENTIFIER_CHAR.test(character)) {
      const position = offset + index;
      throw new VersionError(
        { kind: "invalid-identifier", input, character, index: position },
        `Invalid character "${character}" at index ${position} in "${input}".`,
      );
    }
  }
}

// =============================================================================
// ORDERING
// =============================================================================

export function compareIdentifiers(a: Identifier, b: Identifier): number {
  if (a.kind === "numeric" && b.kind === "numeric") {
    return Math.sign(a.value - b.value);
  }
  if (a.kind === "numeric") return -1;
  if (b.kind === "numeric") return 1;

  if (a.text === b.text) return 0;
  return a.text < b.text ? -1 : 1;
}

export function incrementNumeric(identifier: NumericIdentifier): NumericIdentifier {
  const value = identifier.value + 1;
  if (!Number.isSafeInteger(value)) {
    throw new VersionError(
      { kind: "numeric-overflow", input: identifier.text },
      `Numeric identifier "${identifier.text}" cannot be incremented.`,
    );
  }
  return { kind: "numeric", text: String(value), value };
}
