import type { ReplacementRule, RuleRole } from "../core/types";

/**
 * Named captures recorded while rewriting one request, keyed by the role of
 * the message that produced them. One instance per request; never shared.
 */
export class CaptureContext {
  private readonly captures = new Map<RuleRole, Map<string, string>>();
  private readonly disabled = new Set<ReplacementRule>();

  /** Forgets what an earlier message of `role` captured. */
  reset(role: RuleRole): void {
    this.captures.delete(role);
  }

  record(role: RuleRole, values: Record<string, string | undefined>): void {
    let target = this.captures.get(role);
    if (!target) {
      target = new Map();
      this.captures.set(role, target);
    }
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        target.set(key, value);
      }
    }
  }

  get(role: RuleRole, key: string): string | undefined {
    return this.captures.get(role)?.get(key);
  }

  hasCaptures(role: RuleRole): boolean {
    return (this.captures.get(role)?.size ?? 0) > 0;
  }

  /**
   * Looks `key` up in `roles`, most recently listed role winning, or in every
   * role when `roles` is omitted.
   */
  lookup(key: string, roles?: readonly RuleRole[]): string | undefined {
    const searched = roles ?? [...this.captures.keys()];
    let found: string | undefined;
    for (const role of searched) {
      const value = this.get(role, key);
      if (value !== undefined) {
        found = value;
      }
    }
    return found;
  }

  disable(rule: ReplacementRule): void {
    this.disabled.add(rule);
  }

  isDisabled(rule: ReplacementRule): boolean {
    return this.disabled.has(rule);
  }
}
