import type { RuleVerdict } from '../types/index.js';
import { hostMatches } from '../features/target.js';
import type { RuleContext } from './context.js';
import type { PolicyProfile } from './policy.js';

export function tier4Distraction(ctx: RuleContext, policy: PolicyProfile): RuleVerdict | undefined {
  const { host } = ctx.target;
  if (!host) return undefined;

  const domain = policy.distraction_domains.find(d => hostMatches(host, d));
  if (domain) {
    return { action: 'block', tier: 'distraction', reason: `distraction domain ${domain}` };
  }
  return undefined;
}
