import { z, type ZodIssue } from "zod";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const DEFAULT_PROFILE = "qhub";
export const DEFAULT_KUBERNETES_VERSION = "v1.20.2";
export const DEFAULT_DOMAIN = "github-actions.qhub.dev";

const nonEmpty = z.string().trim().min(1);

export const DevelopOptionsSchema = z
  .object({
    verbose: z.boolean().default(true),
    buildImages: z.boolean().default(true),
    profile: nonEmpty.default(DEFAULT_PROFILE),
    kubernetesVersion: nonEmpty
      .regex(/^v?\d+\.\d+\.\d+$/, "expected a Kubernetes version such as v1.20.2")
      .default(DEFAULT_KUBERNETES_VERSION),
    domain: nonEmpty.default(DEFAULT_DOMAIN),
    config: nonEmpty.optional(),
  })
  .strict();

export type DevelopOptions = z.infer<typeof DevelopOptionsSchema>;
export type DevelopOptionsInput = z.input<typeof DevelopOptionsSchema>;

export const ToolOptionsSchema = z.object({
  minikubeBin: nonEmpty.default("minikube"),
  qhubBin: nonEmpty.default("qhub"),
});

export type ToolOptions = z.infer<typeof ToolOptionsSchema>;

// =============================================================================
// PARSING
// =============================================================================

export function parseDevelopOptions(input: DevelopOptionsInput): DevelopOptions {
  const result = DevelopOptionsSchema.safeParse(input);
  if (!result.success) {
    throw createOptionsError(result.error.issues);
  }
  return result.data;
}

export function parseToolOptions(
  flags: { minikubeBin?: string; qhubBin?: string },
  env: NodeJS.ProcessEnv = process.env,
): ToolOptions {
  const result = ToolOptionsSchema.safeParse({
    minikubeBin: flags.minikubeBin ?? env.QHUB_DEVELOP_MINIKUBE_BIN,
    qhubBin: flags.qhubBin ?? env.QHUB_DEVELOP_QHUB_BIN,
  });
  if (!result.success) {
    throw createOptionsError(result.error.issues);
  }
  return result.data;
}

function createOptionsError(issues: ZodIssue[]): UserFacingError {
  const detail = issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Invalid develop options.",
    message: `Invalid develop options: ${detail}`,
    hint: "Run qhub-develop develop --help for the accepted flags.",
  });
}
