import type { ParsedTarget } from '../features/target.js';
import type { Mission, RuleVerdict } from '../types/index.js';
import type { PolicyProfile } from './policy.js';

export interface RuleContext {
  target: ParsedTarget;
  mission?: Mission;
  // Title and description of the page, when the caller has them
  pageText?: string;
}

export type RuleTier = (ctx: RuleContext, policy: PolicyProfile) => RuleVerdict | undefined;
