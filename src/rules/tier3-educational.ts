import type { RuleVerdict } from '../types/index.js';
import { hostMatches } from '../features/target.js';
import type { RuleContext } from './context.js';
import type { PolicyProfile } from './policy.js';

export function tier3Educational(ctx: RuleContext, policy: PolicyProfile): RuleVerdict | undefined {
  const { host } = ctx.target;
  if (!host) return undefined;

  const curated = policy.educational_domains.find(d => hostMatches(host, d));
  if (curated) {
    return { action: 'allow', tier: 'educational', reason: `educational domain ${curated}` };
  }

  const missionDomain = ctx.mission?.allowedDomains
    .map(d => d.trim().toLowerCase().replace(/^www\./, ''))
    .find(d => d && hostMatches(host, d));
  if (missionDomain) {
    return { action: 'allow', tier: 'educational', reason: `mission-allowed domain ${missionDomain}` };
  }
  return undefined;
}
