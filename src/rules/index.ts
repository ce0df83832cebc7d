export { loadPolicyProfile, policyProfileSchema, DEFAULT_POLICY_PATH, type PolicyProfile } from './policy.js';
export type { RuleContext, RuleTier } from './context.js';
export { tier1ShortForm } from './tier1-short-form.js';
export { tier2Infrastructure } from './tier2-infrastructure.js';
export { tier3Educational } from './tier3-educational.js';
export { tier4Distraction } from './tier4-distraction.js';
export { tier5Feed } from './tier5-feed.js';
export { tier6Platform } from './tier6-platform.js';
export { tier7Search } from './tier7-search.js';

import type { RuleVerdict } from '../types/index.js';
import type { RuleContext, RuleTier } from './context.js';
import type { PolicyProfile } from './policy.js';
import { tier1ShortForm } from './tier1-short-form.js';
import { tier2Infrastructure } from './tier2-infrastructure.js';
import { tier3Educational } from './tier3-educational.js';
import { tier4Distraction } from './tier4-distraction.js';
import { tier5Feed } from './tier5-feed.js';
import { tier6Platform } from './tier6-platform.js';
import { tier7Search } from './tier7-search.js';

// Order is precedence: the first tier with a verdict wins
const TIERS: RuleTier[] = [
  tier1ShortForm,
  tier2Infrastructure,
  tier3Educational,
  tier4Distraction,
  tier5Feed,
  tier6Platform,
  tier7Search
];

export const DEFAULT_VERDICT: RuleVerdict = {
  action: 'allow',
  tier: 'default',
  reason: 'no rule matched'
};

export function runRuleTier(ctx: RuleContext, policy: PolicyProfile): RuleVerdict {
  for (const tier of TIERS) {
    const verdict = tier(ctx, policy);
    if (verdict) return verdict;
  }
  return DEFAULT_VERDICT;
}
