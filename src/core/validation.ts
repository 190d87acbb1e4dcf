import { z } from "zod";

export const AgentEntrySchema = z.object({
  name: z.string(),
  enabled: z.boolean().default(false),
  requires_cli: z.boolean().default(false),
});

/**
 * Shape of .x100/config.json. Unknown keys pass through untouched.
 */
export const X100ConfigSchema = z
  .object({
    default_agent: z.string().optional(),
    project_name: z.string().optional(),
    project_code: z.string().optional(),
    backend: z.string().nullable().optional(),
    frontend: z.string().nullable().optional(),
    project: z
      .object({
        url: z.string().optional(),
        id: z.string().optional(),
        type: z.string().optional(),
      })
      .passthrough()
      .optional(),
    agents: z.record(AgentEntrySchema).optional(),
  })
  .passthrough();

export type X100Config = z.infer<typeof X100ConfigSchema>;

/**
 * Shape of .x100/nextstep.json as written on disk.
 */
export const NextstepFileSchema = z.object({
  default_ai_agent: z.string().optional(),
  analysis: z
    .object({
      coverage_threshold: z.number().min(0).max(100).default(80),
      stale_issue_days: z.number().int().positive().default(30),
      stale_pr_days: z.number().int().positive().default(7),
      max_fixme_count: z.number().int().nonnegative().default(10),
    })
    .default({}),
  github: z
    .object({
      enabled: z.boolean().default(false),
      token_env: z.string().default("GITHUB_TOKEN"),
      repo: z.string().nullable().optional(),
    })
    .default({}),
  health_weights: z
    .object({
      velocity: z.number().nonnegative().default(0.2),
      quality: z.number().nonnegative().default(0.3),
      blockers: z.number().nonnegative().default(0.3),
      activity: z.number().nonnegative().default(0.2),
    })
    .default({}),
});

export type NextstepFile = z.infer<typeof NextstepFileSchema>;

/**
 * Safe validation - returns { success, data, error } without throwing.
 */
export function safeValidateConfig(data: unknown) {
  return X100ConfigSchema.safeParse(data);
}

export function safeValidateNextstepFile(data: unknown) {
  return NextstepFileSchema.safeParse(data);
}

/**
 * Flatten zod issues into a single readable line.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
