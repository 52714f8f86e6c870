export class ReleaseError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ReleaseError";
  }
}

export class ConfigError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class CargoError extends ReleaseError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CargoError";
  }
}

// =============================================================================
// DOMAIN ERRORS
// =============================================================================

export type BumpLabel = "patch" | "minor" | "major" | "pre";

export type VersionErrorDetail =
  | { kind: "prerelease-not-empty"; bump: BumpLabel; version: string }
  | { kind: "prerelease-not-set"; version: string }
  | { kind: "invalid-identifier"; input: string; character: string; index: number }
  | { kind: "empty-identifier"; input: string }
  | { kind: "numeric-overflow"; input: string }
  | { kind: "leading-zero"; input: string; index: number }
  | { kind: "non-numeric-prerelease"; prerelease: string; span: { start: number; end: number } }
  | { kind: "invalid-version"; input: string }
  | { kind: "not-greater"; from: string; to: string };

export class VersionError extends ReleaseError {
  readonly detail: VersionErrorDetail;

  constructor(detail: VersionErrorDetail, message: string, cause?: unknown) {
    super(message, cause);
    this.name = "VersionError";
    this.detail = detail;
  }

  get kind(): VersionErrorDetail["kind"] {
    return this.detail.kind;
  }
}

export type SelectionErrorKind =
  | "empty-selection"
  | "conflicting-modes"
  | "unknown-package"
  | "no-root-version"
  | "no-workspace-package";

export class SelectionError extends ReleaseError {
  constructor(
    public readonly kind: SelectionErrorKind,
    message: string,
    public readonly packageName?: string,
  ) {
    super(message);
    this.name = "SelectionError";
  }
}

export type ManifestErrorKind =
  | "not-loaded"
  | "read-failed"
  | "parse-failed"
  | "version-not-found"
  | "invalid-version-item"
  | "set-by-workspace"
  | "write-failed";

export class ManifestError extends ReleaseError {
  constructor(
    public readonly kind: ManifestErrorKind,
    public readonly manifestPath: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ManifestError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  selection: "SELECTION_ERROR",
  version: "VERSION_ERROR",
  manifest: "MANIFEST_ERROR",
  git: "GIT_ERROR",
  cargo: "CARGO_ERROR",
  task: "TASK_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
