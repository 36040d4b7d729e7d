import type { ReportDiagnostic } from "../core/diagnostics";
import type { ChatMessage } from "../core/openai-schemas";
import type { ReplacementRule, RuleRole } from "../core/types";
import { mapContentText } from "../core/utils/content";
import {
  escapeRegExp,
  extractInlineFlags,
  toJavaScriptPattern,
  toJavaScriptReplacement,
} from "../core/utils/regex";
import type { CaptureContext } from "./capture-context";

export interface RuleEngineOptions {
  rules: readonly ReplacementRule[];
  context: CaptureContext;
  report?: ReportDiagnostic;
}

const PLACEHOLDER_REGEX = /\{\{|\}\}|\{([A-Za-z_]\w*)\}/g;

function fillPlaceholders(
  template: string,
  lookup: (key: string) => string | undefined,
  escapeValue: (value: string) => string
): string {
  return template.replace(PLACEHOLDER_REGEX, (token, key?: string) => {
    if (key === undefined) {
      return token === "{{" ? "{" : "}";
    }
    return escapeValue(lookup(key) ?? "");
  });
}

function escapeReplacementValue(value: string): string {
  return value.replace(/\\/g, "\\\\");
}

function compileRule(
  rule: ReplacementRule,
  pattern: string,
  { context, report }: RuleEngineOptions
): RegExp | undefined {
  try {
    const { source, flags } = extractInlineFlags(pattern);
    return new RegExp(
      toJavaScriptPattern(source),
      rule.replacement === undefined ? flags : `${flags}g`
    );
  } catch (error) {
    context.disable(rule);
    report?.({
      kind: "invalid-rule-pattern",
      ruleName: rule.name,
      role: rule.role,
      pattern: rule.pattern,
      message: error instanceof Error ? error.message : String(error),
    });
    return;
  }
}

/**
 * Runs every rule targeting `role` over `text`, in declaration order.
 *
 * A rule with a `trigger` only runs once that capture is known. A rule with
 * `ref` roles only runs once one of those roles captured something, and
 * resolves `{key}` placeholders in its pattern (regex-escaped) and replacement
 * from their captures; unknown keys resolve to the empty string. A rule
 * without a replacement records its named groups for `role` instead of
 * rewriting.
 */
export function applyRules(
  text: string,
  role: RuleRole,
  options: RuleEngineOptions
): string {
  const { rules, context } = options;
  let result = text;

  for (const rule of rules) {
    if (rule.role !== role || context.isDisabled(rule)) {
      continue;
    }
    const refs = rule.ref && rule.ref.length > 0 ? rule.ref : undefined;
    if (rule.trigger && !context.lookup(rule.trigger, refs)) {
      continue;
    }
    if (refs && !refs.some((ref) => context.hasCaptures(ref))) {
      continue;
    }

    const lookup = (key: string) => context.lookup(key, refs);
    const pattern = refs
      ? fillPlaceholders(rule.pattern, lookup, escapeRegExp)
      : rule.pattern;
    const regex = compileRule(rule, pattern, options);
    if (!regex) {
      continue;
    }

    if (rule.replacement === undefined) {
      const match = regex.exec(result);
      if (match?.groups) {
        context.record(role, match.groups);
      }
      continue;
    }

    const template = refs
      ? fillPlaceholders(rule.replacement, lookup, escapeReplacementValue)
      : rule.replacement;
    result = result.replace(regex, toJavaScriptReplacement(template));
  }

  return result;
}

/**
 * Rewrites every message in order, so captures made by earlier messages are
 * visible to rules applied to later ones. Each message first clears what the
 * previous message of the same role captured.
 */
export function rewriteMessages(
  messages: readonly ChatMessage[],
  options: RuleEngineOptions
): ChatMessage[] {
  return messages.map((message) => {
    options.context.reset(message.role);
    return {
      ...message,
      content: mapContentText(message.content, (text) =>
        applyRules(text, message.role, options)
      ),
    };
  });
}

export function hasRulesFor(
  rules: readonly ReplacementRule[],
  role: RuleRole
): boolean {
  return rules.some((rule) => rule.role === role);
}
