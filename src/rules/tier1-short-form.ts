import type { RuleVerdict } from '../types/index.js';
import { hostMatches } from '../features/target.js';
import type { RuleContext } from './context.js';
import type { PolicyProfile } from './policy.js';

export function tier1ShortForm(ctx: RuleContext, policy: PolicyProfile): RuleVerdict | undefined {
  const { host, urlLower } = ctx.target;

  for (const platform of policy.short_form) {
    if (!hostMatches(host, platform.domain)) continue;

    const marker = platform.markers.find(m => urlLower.includes(m));
    if (marker) {
      return { action: 'block', tier: 'short-form', reason: `${platform.domain} short-form content (${marker})` };
    }
  }
  return undefined;
}
