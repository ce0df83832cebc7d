import type { RuleVerdict } from '../types/index.js';
import type { RuleContext } from './context.js';
import type { PolicyProfile } from './policy.js';
import { pathPrefixMatches } from './tier2-infrastructure.js';

export function tier5Feed(ctx: RuleContext, policy: PolicyProfile): RuleVerdict | undefined {
  const { host, path } = ctx.target;

  const site = policy.feed.site_prefixes.find(p => pathPrefixMatches(host + path, p));
  if (site) {
    return { action: 'block', tier: 'feed', reason: `feed page ${site}` };
  }

  const segments = path.split('/').filter(Boolean);
  const segment = segments.find(s => policy.feed.path_segments.includes(s));
  if (segment) {
    return { action: 'block', tier: 'feed', reason: `feed path segment /${segment}` };
  }
  return undefined;
}
