export type Action = 'allow' | 'block';

export type RuleTierName =
  | 'short-form'
  | 'infrastructure'
  | 'educational'
  | 'distraction'
  | 'feed'
  | 'platform'
  | 'search'
  | 'default';

export interface RuleVerdict {
  action: Action;
  tier: RuleTierName;
  reason: string;
}

export interface Verdict {
  action: Action;
  confidence: number;
  source: 'rules' | 'classifier';
}

export interface DecisionRecord {
  id?: number;
  url: string;
  mission: string;
  features: Float32Array;
  action: Action;
  confidence: number;
  timestamp: number;
  correct?: boolean;
  reward?: number;
}
