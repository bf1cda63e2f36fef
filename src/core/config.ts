import { z } from "zod";

import { validatePassSelection } from "../engine/optimize/pipeline.js";
import { OPTIMIZATION_PASS_NAMES } from "../engine/optimize/types.js";
import { LicensePolicyTableSchema } from "../license/policy.js";

// =============================================================================
// REPOSITORIES
// =============================================================================

export const RepositoryLicenseSchema = z
  .object({
    id: z.string().min(1),
    text: z.string().optional(),
    text_file: z.string().min(1).optional(),
  })
  .strict();

export const RepositoryConfigSchema = z
  .object({
    id: z.string().min(1),
    path: z.string().min(1),
    trust_rank: z.number().int().default(0),
    license: RepositoryLicenseSchema.optional(),
    include: z.array(z.string().min(1)).default(["**/*"]),
    exclude: z.array(z.string().min(1)).default([]),
  })
  .strict();

// =============================================================================
// ENGINE
// =============================================================================

export const EngineConfigSchema = z
  .object({
    near_duplicate_threshold: z.number().min(0).max(1).default(0.1),
    auto_merge_confidence_floor: z.number().min(0).max(1).default(0.95),
    enabled_optimization_passes: z
      .array(z.enum(OPTIMIZATION_PASS_NAMES))
      .default([...OPTIMIZATION_PASS_NAMES])
      .superRefine((passes, ctx) => {
        try {
          validatePassSelection(passes);
        } catch (err) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: err instanceof Error ? err.message : String(err),
          });
        }
      }),
    pass_timeout_seconds: z.number().min(0).default(30),
    fingerprint_concurrency: z.number().int().min(1).default(4),
    allow_incompatible_cycles: z.boolean().default(false),
    export_roots: z.array(z.string().min(1)).default([]),
  })
  .strict();

// =============================================================================
// OUTPUT
// =============================================================================

export const OutputConfigSchema = z
  .object({
    dir: z.string().min(1).default("merged"),
    file: z.string().min(1).default("index.ts"),
  })
  .strict();

// =============================================================================
// PROJECT
// =============================================================================

export const ProjectConfigSchema = z
  .object({
    repositories: z
      .array(RepositoryConfigSchema)
      .min(1)
      .superRefine((repositories, ctx) => {
        const seen = new Set<string>();
        repositories.forEach((repository, index) => {
          if (seen.has(repository.id)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [index, "id"],
              message: `Duplicate repository id "${repository.id}".`,
            });
          }
          seen.add(repository.id);
        });
      }),
    license_policy: z.union([z.string().min(1), LicensePolicyTableSchema]).optional(),
    engine: EngineConfigSchema.default({}),
    output: OutputConfigSchema.default({}),
  })
  .strict();

export type RepositoryLicenseConfig = z.infer<typeof RepositoryLicenseSchema>;
export type RepositoryConfig = z.infer<typeof RepositoryConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export function defaultEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return { ...EngineConfigSchema.parse({}), ...overrides };
}
