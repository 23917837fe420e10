import { z } from "zod";

const HostingSchema = z
  .object({
    driver: z.enum(["github"]).optional(),
    origin_hostname: z.string().min(1).optional(),
    api_token: z.string().min(1).optional(),
    api_url: z.string().url().optional(),
    timeout_ms: z.number().int().positive().default(30_000),
  })
  .strict();

export const ForklineConfigSchema = z
  .object({
    main_branch: z.string().min(1).default("main"),
    perennial_branches: z.array(z.string().min(1)).default([]),
    remote: z.string().min(1).default("origin"),

    // Push branches created by hack/append/prepend right away.
    push_new_branches: z.boolean().default(false),
    // Skip every step that talks to the remote.
    offline: z.boolean().default(false),

    // How feature branches pick up their parent's changes.
    sync_strategy: z.enum(["merge", "rebase"]).default("merge"),
    // How perennial branches pick up their tracking branch.
    pull_branch_strategy: z.enum(["rebase", "merge"]).default("rebase"),

    hosting: HostingSchema.default({}),
  })
  .strict();

export type ForklineConfig = z.infer<typeof ForklineConfigSchema>;
export type HostingConfig = z.infer<typeof HostingSchema>;

export function defaultConfig(): ForklineConfig {
  return ForklineConfigSchema.parse({});
}
