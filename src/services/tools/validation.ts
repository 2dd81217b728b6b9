/**
 * Pattern-based rejection rules for tool arguments and rendered commands
 *
 * A rule rejects a value when its pattern matches anywhere in it.
 */

/**
 * Rule as declared in a tool definition
 */
export interface ValidationRule {
  pattern: string;
  message?: string;
}

/**
 * Outcome of checking a value against a rule set
 */
export type RuleCheckResult =
  | { valid: true }
  | { valid: false; error: string };

/**
 * Compiled form of a rule
 */
export interface CompiledRule {
  regex: RegExp;
  message: string;
}

/**
 * Check that a rule pattern compiles
 */
export function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

/**
 * Compile rules once per tool; empty patterns are dropped
 * @throws SyntaxError on an invalid pattern
 */
export function compileRules(rules: readonly ValidationRule[]): CompiledRule[] {
  return rules
    .filter((rule) => rule.pattern.length > 0)
    .map((rule) => ({
      regex: new RegExp(rule.pattern),
      message: rule.message ?? `Validation failed for pattern: ${rule.pattern}`,
    }));
}

/**
 * Run rules in order; the first match wins
 */
export function checkRules(value: string, rules: readonly CompiledRule[]): RuleCheckResult {
  for (const rule of rules) {
    if (rule.regex.test(value)) {
      return { valid: false, error: rule.message };
    }
  }
  return { valid: true };
}
