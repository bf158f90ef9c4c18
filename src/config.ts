import { z } from "zod";
import { DEFAULT_HTTP_TIMEOUT, DEFAULT_MONTHS } from "./constants.js";

const positiveInt = z.coerce.number().int().positive();
// Zero keeps only today; a negative window keeps nothing.
const monthsSchema = z.coerce.number().int();

export const outputFormatSchema = z.enum(["text", "markdown", "json", "html"]);

/**
 * Environment overrides, usually loaded from `.env`. RELEASE_NOTES_MONTHS is
 * validated separately, and only when `--months` is absent.
 */
export const envSchema = z.object({
  RELEASE_NOTES_TIMEOUT_MS: positiveInt.default(DEFAULT_HTTP_TIMEOUT),
  RELEASE_NOTES_USER_AGENT: z.string().min(1).optional(),
});

// An empty value, as `.env` files often carry, means unset.
const envMonthsSchema = z.object({
  RELEASE_NOTES_MONTHS: z.preprocess((value) => (value === "" ? undefined : value), monthsSchema.optional()),
});

export const cliOptionsSchema = z.object({
  url: z.string().url(),
  months: monthsSchema.optional(),
  output: outputFormatSchema.default("text"),
  file: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface ResolvedConfig {
  url: string;
  months: number;
  output: z.infer<typeof outputFormatSchema>;
  file?: string;
  verbose: boolean;
  timeout: number;
  userAgent?: string;
}

export type ConfigResult = { ok: true; config: ResolvedConfig } | { ok: false; errors: string[] };

function describeIssues(error: z.ZodError, prefix: string): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return `${prefix}${path ? `${path}: ` : ""}${issue.message}`;
  });
}

/**
 * Validates command-line options and merges them over the environment.
 * A `--months` flag wins over RELEASE_NOTES_MONTHS, which wins over the default.
 */
export function resolveConfig(options: unknown, env: NodeJS.ProcessEnv): ConfigResult {
  const envResult = envSchema.safeParse(env);
  const optionsResult = cliOptionsSchema.safeParse(options);
  const monthsGiven = z.object({ months: z.unknown() }).safeParse(options);
  const monthsResult = envMonthsSchema.safeParse(
    monthsGiven.success && monthsGiven.data.months !== undefined ? {} : env
  );

  const errors = [
    ...(envResult.success ? [] : describeIssues(envResult.error, "env ")),
    ...(monthsResult.success ? [] : describeIssues(monthsResult.error, "env ")),
    ...(optionsResult.success ? [] : describeIssues(optionsResult.error, "--")),
  ];
  if (!envResult.success || !monthsResult.success || !optionsResult.success) {
    return { ok: false, errors };
  }

  const cli = optionsResult.data;
  const fromEnv = envResult.data;

  return {
    ok: true,
    config: {
      url: cli.url,
      months: cli.months ?? monthsResult.data.RELEASE_NOTES_MONTHS ?? DEFAULT_MONTHS,
      output: cli.output,
      file: cli.file,
      verbose: cli.verbose,
      timeout: fromEnv.RELEASE_NOTES_TIMEOUT_MS,
      userAgent: fromEnv.RELEASE_NOTES_USER_AGENT,
    },
  };
}
