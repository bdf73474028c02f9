import type { TargetingConfig } from '../../lib/targeting-config';

export type RuleExclusionReason = 'handle_excluded' | 'text_excluded';

/** Operator substring rules from the targeting document; patterns are already lower-cased. */
export function excludedByRules(
  handle: string,
  text: string | null | undefined,
  rules: TargetingConfig['exclude']
): RuleExclusionReason | null {
  const lowerHandle = handle.toLowerCase();
  if (rules.handleContains.some((pattern) => lowerHandle.includes(pattern))) return 'handle_excluded';

  const lowerText = (text ?? '').toLowerCase();
  if (lowerText && rules.textContains.some((pattern) => lowerText.includes(pattern))) return 'text_excluded';

  return null;
}
