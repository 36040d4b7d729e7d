import { z } from "zod";
import { ProxyConfigError } from "./errors.js";

const FLAG_VALUES = [
  "1",
  "true",
  "yes",
  "on",
  "0",
  "false",
  "no",
  "off",
] as const;
const TRUE_VALUES: readonly string[] = ["1", "true", "yes", "on"];

function flag(fallback: boolean) {
  return z
    .preprocess(
      (value) =>
        typeof value === "string" ? value.trim().toLowerCase() : value,
      z.enum(FLAG_VALUES).optional()
    )
    .transform((value) =>
      value === undefined ? fallback : TRUE_VALUES.includes(value)
    );
}

export const proxyEnvSchema = z
  .object({
    TARGET_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
    TARGET_API_KEY: z.string().optional(),
    TOOL_CALL_ADAPTER_HOST: z.string().default("0.0.0.0"),
    TOOL_CALL_ADAPTER_PORT: z.coerce
      .number()
      .int()
      .min(0)
      .max(65_535)
      .default(8000),
    TOOL_CALL_ADAPTER_STRICT: flag(true),
    TOOL_CALL_ADAPTER_FORCE_TOOL_CHOICE: flag(false),
    TOOL_CALL_ADAPTER_SETTING: z.string().optional(),
    TOOL_CALL_ADAPTER_DUMP_DIR: z.string().optional(),
  })
  .transform((env) => ({
    targetBaseURL: env.TARGET_BASE_URL,
    targetApiKey: env.TARGET_API_KEY,
    host: env.TOOL_CALL_ADAPTER_HOST,
    port: env.TOOL_CALL_ADAPTER_PORT,
    strict: env.TOOL_CALL_ADAPTER_STRICT,
    forceToolChoice: env.TOOL_CALL_ADAPTER_FORCE_TOOL_CHOICE,
    settingPath: env.TOOL_CALL_ADAPTER_SETTING,
    dumpDir: env.TOOL_CALL_ADAPTER_DUMP_DIR,
  }));

export type ProxyConfig = z.output<typeof proxyEnvSchema>;

/** Reads the proxy configuration; empty variables count as unset. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ProxyConfig {
  const defined = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value !== ""
    )
  );
  const parsed = proxyEnvSchema.safeParse(defined);
  if (!parsed.success) {
    throw new ProxyConfigError(
      `Invalid environment: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      parsed.error
    );
  }
  return parsed.data;
}
