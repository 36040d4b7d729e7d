import YAML from "yaml";
import { z } from "zod";
import { AdapterSettingsError } from "../core/errors";
import type { ReplacementRule } from "../core/types";

const ruleRoleSchema = z.enum([
  "system",
  "user",
  "assistant",
  "tool",
  "completion",
]);

const replacementRuleSchema = z
  .object({
    name: z.string().nullish(),
    role: ruleRoleSchema,
    trigger: z.string().nullish(),
    pattern: z.string(),
    replace: z.string().nullish(),
    ref: z.array(ruleRoleSchema).nullish(),
  })
  .strict();

const yamlSettingsSchema = z.object({
  additional_replacement: z.array(replacementRuleSchema).nullish(),
});

const legacyJsonSettingsSchema = z.object({
  additional_replacement: z
    .record(z.string(), z.record(z.string(), z.string()))
    .nullish(),
});

export interface AdapterSettings {
  rules: ReplacementRule[];
}

function toRule(
  item: z.infer<typeof replacementRuleSchema>
): ReplacementRule {
  return {
    role: item.role,
    pattern: item.pattern,
    ...(item.name ? { name: item.name } : {}),
    ...(item.trigger ? { trigger: item.trigger } : {}),
    ...(item.replace != null ? { replacement: item.replace } : {}),
    ...(item.ref && item.ref.length > 0 ? { ref: item.ref } : {}),
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parses a `setting.yaml` document:
 *
 * ```yaml
 * additional_replacement:
 *   - role: user
 *     pattern: "ID:(?P<user_id>\\d+)"
 *   - role: completion
 *     trigger: user_id
 *     ref: [user]
 *     pattern: Hello
 *     replace: "Hello #{user_id}!"
 * ```
 */
export function parseYamlSettings(source: string): AdapterSettings {
  let document: unknown;
  try {
    document = YAML.parse(source);
  } catch (error) {
    throw new AdapterSettingsError("Settings file is not valid YAML", error);
  }

  const parsed = yamlSettingsSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new AdapterSettingsError(
      `Invalid settings: ${formatIssues(parsed.error)}`,
      parsed.error
    );
  }
  return { rules: (parsed.data.additional_replacement ?? []).map(toRule) };
}

/**
 * Parses the older `setting.json` layout, a role-to-(pattern → replacement)
 * map. Rules come out grouped by role, in key order.
 */
export function parseLegacyJsonSettings(source: string): AdapterSettings {
  let document: unknown;
  try {
    document = JSON.parse(source);
  } catch (error) {
    throw new AdapterSettingsError("Settings file is not valid JSON", error);
  }

  const parsed = legacyJsonSettingsSchema.safeParse(document);
  if (!parsed.success) {
    throw new AdapterSettingsError(
      `Invalid settings: ${formatIssues(parsed.error)}`,
      parsed.error
    );
  }

  const rules: ReplacementRule[] = [];
  for (const [role, replacements] of Object.entries(
    parsed.data.additional_replacement ?? {}
  )) {
    const roleResult = ruleRoleSchema.safeParse(role);
    if (!roleResult.success) {
      throw new AdapterSettingsError(
        `Invalid settings: unknown role "${role}" in additional_replacement`,
        roleResult.error
      );
    }
    for (const [pattern, replacement] of Object.entries(replacements)) {
      rules.push({ role: roleResult.data, pattern, replacement });
    }
  }
  return { rules };
}
