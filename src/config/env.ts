import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { DEFAULT_SCRIPT_NAME } from "../locator/script-locator.js";
import { ConfigError } from "../util/errors.js";

/** Default retry budget for a hammer loop */
export const DEFAULT_HAMMER_BUDGET = 5;

export const envSchema = z.object({
  ANVIL_HAMMER_BUDGET: z.coerce.number().int().min(0).default(DEFAULT_HAMMER_BUDGET),
  ANVIL_HAMMER_SCRIPT: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, "must be a file name, not a path")
    .default(DEFAULT_SCRIPT_NAME),
  ANVIL_LM_BASE_PATH: z.string().url().default("https://api.openai.com/v1"),
  ANVIL_LM_FAST_MODEL: z.string().min(1).default("gpt-3.5-turbo-1106"),
  ANVIL_LM_SMART_MODEL: z.string().min(1).default("gpt-4-1106-preview"),
  ANVIL_SCRIPT_DIR: z.string().min(1).optional(),
});

export interface AnvilConfig {
  /** LM service URL passed to every action */
  lmBasePath: string;
  fastModel: string;
  smartModel: string;
  /** Directory holding the action scripts (hammer, edit, prompt, ...) */
  scriptDir: string;
  /** File name of the project verification script */
  hammerScript: string;
  hammerBudget: number;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}

/** Parse a budget given on the command line */
export function parseBudget(value: string): number {
  const parsed = envSchema.shape.ANVIL_HAMMER_BUDGET.safeParse(value);
  if (!parsed.success) {
    const reasons = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigError(`Invalid budget "${value}": ${reasons}`, parsed.error);
  }
  return parsed.data;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AnvilConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`, parsed.error);
  }
  const values = parsed.data;
  return {
    lmBasePath: values.ANVIL_LM_BASE_PATH,
    fastModel: values.ANVIL_LM_FAST_MODEL,
    smartModel: values.ANVIL_LM_SMART_MODEL,
    scriptDir: values.ANVIL_SCRIPT_DIR ?? join(homedir(), ".anvil", "bin"),
    hammerScript: values.ANVIL_HAMMER_SCRIPT,
    hammerBudget: values.ANVIL_HAMMER_BUDGET,
  };
}
