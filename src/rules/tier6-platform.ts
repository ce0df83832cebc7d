import type { RuleVerdict } from '../types/index.js';
import { hostMatches } from '../features/target.js';
import { missionKeywords, textMatchesMission } from '../features/keywords.js';
import type { RuleContext } from './context.js';
import type { PolicyProfile } from './policy.js';

export function tier6Platform(ctx: RuleContext, policy: PolicyProfile): RuleVerdict | undefined {
  const { host, path, urlLower } = ctx.target;
  if (!host) return undefined;

  const platform = policy.platforms.find(p => hostMatches(host, p.domain));
  if (!platform) return undefined;

  const keyword = platform.educational_keywords.find(k => urlLower.includes(k));
  if (keyword) {
    return { action: 'allow', tier: 'platform', reason: `${platform.domain} educational keyword "${keyword}"` };
  }

  const isWatch = platform.watch_paths.some(p => path.startsWith(p));
  if (!isWatch) {
    return { action: 'allow', tier: 'platform', reason: `${platform.domain} non-watch page` };
  }

  // Without page text or a mission there is nothing to align against
  const text = ctx.pageText?.trim() ?? '';
  if (!text) {
    return { action: 'allow', tier: 'platform', reason: `${platform.domain} watch page without metadata` };
  }

  const keywords = missionKeywords(ctx.mission);
  if (keywords.length === 0) {
    return { action: 'allow', tier: 'platform', reason: `${platform.domain} watch page without mission` };
  }

  return textMatchesMission(text, keywords)
    ? { action: 'allow', tier: 'platform', reason: `${platform.domain} watch page aligned with mission` }
    : { action: 'block', tier: 'platform', reason: `${platform.domain} watch page not aligned with mission` };
}
