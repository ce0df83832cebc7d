import type { RuleVerdict } from '../types/index.js';
import { hostMatches } from '../features/target.js';
import type { RuleContext } from './context.js';
import type { PolicyProfile } from './policy.js';

export function pathPrefixMatches(hostPath: string, prefix: string): boolean {
  return hostPath === prefix || hostPath.startsWith(`${prefix}/`);
}

export function tier2Infrastructure(ctx: RuleContext, policy: PolicyProfile): RuleVerdict | undefined {
  const { host, path } = ctx.target;
  if (!host) return undefined;

  const domain = policy.infrastructure.domains.find(d => hostMatches(host, d));
  if (domain) {
    return { action: 'allow', tier: 'infrastructure', reason: `infrastructure domain ${domain}` };
  }

  const hostPath = host + path;
  const prefix = policy.infrastructure.path_prefixes.find(p => pathPrefixMatches(hostPath, p));
  if (prefix) {
    return { action: 'allow', tier: 'infrastructure', reason: `infrastructure endpoint ${prefix}` };
  }
  return undefined;
}
