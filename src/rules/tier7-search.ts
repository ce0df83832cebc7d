import type { RuleVerdict } from '../types/index.js';
import type { RuleContext } from './context.js';
import type { PolicyProfile } from './policy.js';

export function tier7Search(ctx: RuleContext, policy: PolicyProfile): RuleVerdict | undefined {
  const { host } = ctx.target;
  if (policy.search_engines.includes(host)) {
    return { action: 'allow', tier: 'search', reason: `search engine ${host}` };
  }
  return undefined;
}
