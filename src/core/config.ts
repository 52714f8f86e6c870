import { z } from "zod";

export const DEFAULT_CONFIG_FILE = "crate-version.yaml";
export const DEFAULT_LOGS_DIR = "target/crate-version/logs";

export const SuppressSchema = z.enum(["none", "git", "cargo", "all"]);
export type Suppress = z.infer<typeof SuppressSchema>;

const PublishSchema = z
  .object({
    no_verify: z.boolean().default(false),
    allow_dirty: z.boolean().default(false),
  })
  .strict();

const LogsSchema = z
  .object({
    enabled: z.boolean().default(true),
    dir: z.string().min(1).default(DEFAULT_LOGS_DIR),
  })
  .strict();

export const ReleaseConfigSchema = z
  .object({
    // `{version}` expands to the release's root version.
    commit_message: z.string().min(1).optional(),
    tag_prefix: z.string().default(""),
    // Overrides the remotes reported by `git remote`.
    remotes: z.array(z.string().min(1)).optional(),
    suppress: SuppressSchema.default("none"),
    publish: PublishSchema.default({}),
    logs: LogsSchema.default({}),
  })
  .strict();

export type ReleaseConfig = z.infer<typeof ReleaseConfigSchema>;

export function defaultReleaseConfig(): ReleaseConfig {
  return ReleaseConfigSchema.parse({});
}

export function suppressesGit(suppress: Suppress): boolean {
  return suppress === "git" || suppress === "all";
}

export function suppressesCargo(suppress: Suppress): boolean {
  return suppress === "cargo" || suppress === "all";
}
