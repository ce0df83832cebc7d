import type { Logger } from 'pino';
import type { Action, Mission, PageMetadata, PageMetadataInput, RuleVerdict, Verdict } from '../types/index.js';
import { alignmentText, basicMetadata, missionSchema, pageMetadataSchema } from '../types/index.js';
import { describeError } from '../errors.js';
import { parseTarget } from '../features/target.js';
import { extractFeatures } from '../features/extractor.js';
import { runRuleTier, type PolicyProfile } from '../rules/index.js';
import { classify, type LoadedClassifier } from '../classifier/index.js';
import type { DecisionStore } from '../store/decision-store.js';
import type { DecisionCache } from './cache.js';
import type { Statistics, StatisticsSnapshot } from './stats.js';
import type { BoundedMetadataFetcher } from './metadata-fetcher.js';

export interface DecisionEngineDeps {
  policy: PolicyProfile;
  classifier: LoadedClassifier;
  cache: DecisionCache;
  stats: Statistics;
  fetcher: BoundedMetadataFetcher;
  logger: Logger;
  threshold: number;
  // Absent when the store could not be opened; decisions are then served unrecorded
  store?: DecisionStore;
  now?: () => Date;
}

export interface FastDecision {
  action: Action;
}

export interface MetadataDecision {
  action: Action;
  confidence: number;
}

export interface EngineStats extends StatisticsSnapshot {
  mission: string | null;
  cacheSize: number;
  decisionThreshold: number;
  classifierTrained: boolean;
  storeAvailable: boolean;
}

const FAIL_OPEN: MetadataDecision = { action: 'allow', confidence: 0 };

export class DecisionEngine {
  private mission?: Mission;
  private readonly deps: DecisionEngineDeps;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: DecisionEngineDeps) {
    this.deps = deps;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  /** Replaces the active mission wholesale; lists are never merged with the previous one. */
  setMission(mission: Mission): void {
    this.mission = missionSchema.parse(mission);
    this.logger.info({ mission: this.mission.missionText }, 'Mission set');
  }

  clearMission(): void {
    this.mission = undefined;
  }

  currentMission(): Mission | undefined {
    return this.mission;
  }

  clearCache(): void {
    this.deps.cache.clear();
    this.logger.info('Decision cache cleared');
  }

  private cached(url: string): Verdict | undefined {
    const hit = this.deps.cache.get(url);
    if (hit) this.deps.stats.recordCacheHit();
    return hit;
  }

  /** Cached classifier result only; rule verdicts cached by the fast path lack page text. */
  private cachedClassification(url: string): Verdict | undefined {
    const hit = this.deps.cache.get(url);
    if (hit?.source !== 'classifier') return undefined;
    this.deps.stats.recordCacheHit();
    return hit;
  }

  private evaluateRules(url: string, pageText?: string): RuleVerdict {
    return runRuleTier({ target: parseTarget(url), mission: this.mission, pageText }, this.deps.policy);
  }

  private recordRuleVerdict(url: string, verdict: RuleVerdict): void {
    this.deps.stats.recordFastPath();
    this.deps.cache.put(url, { action: verdict.action, confidence: 1, source: 'rules' });
    this.logger.info({ url, action: verdict.action, tier: verdict.tier, reason: verdict.reason }, 'Rule verdict');
  }

  /** Rule-table-only decision for the proxy's per-request hot path. Never blocks or throws. */
  decide(url: string): FastDecision {
    try {
      const hit = this.cached(url);
      if (hit) return { action: hit.action };

      const verdict = this.evaluateRules(url);
      this.recordRuleVerdict(url, verdict);
      return { action: verdict.action };
    } catch (err) {
      this.logger.error({ url, err: describeError(err) }, 'Fast path failed, allowing request');
      return { action: 'allow' };
    }
  }

  /**
   * Decision using page metadata. Rules run first with the page text, so a platform page
   * the fast path allowed without text is still checked for alignment. Only requests that
   * would otherwise fall through to the default allow consult the cache and then the
   * classifier. Slow-path decisions are persisted before returning.
   */
  decideWithMetadata(input: PageMetadataInput): MetadataDecision {
    const parsed = pageMetadataSchema.safeParse(input);
    const metadata: PageMetadata = parsed.success ? parsed.data : basicMetadata(input.url);
    const url = metadata.url;

    try {
      const mission = this.mission;
      const verdict = this.evaluateRules(url, mission ? alignmentText(metadata) : undefined);
      if (verdict.tier !== 'default' || !mission) {
        this.recordRuleVerdict(url, verdict);
        return { action: verdict.action, confidence: 1 };
      }

      const hit = this.cachedClassification(url);
      if (hit) return { action: hit.action, confidence: hit.confidence };

      return this.classifyPage(metadata, mission);
    } catch (err) {
      this.logger.error({ url, err: describeError(err) }, 'Slow path failed, allowing request');
      return FAIL_OPEN;
    }
  }

  /**
   * Fetches metadata through the bounded fetcher, then decides as {@link decideWithMetadata}.
   * Skips the fetch when the page text cannot change the outcome.
   */
  async decideFetched(url: string): Promise<MetadataDecision> {
    try {
      if (!this.mission) return { action: this.decide(url).action, confidence: 1 };

      const urlOnly = this.evaluateRules(url);
      if (urlOnly.tier !== 'default' && urlOnly.tier !== 'platform') {
        this.recordRuleVerdict(url, urlOnly);
        return { action: urlOnly.action, confidence: 1 };
      }

      if (urlOnly.tier === 'default') {
        const hit = this.cachedClassification(url);
        if (hit) return { action: hit.action, confidence: hit.confidence };
      }
    } catch (err) {
      this.logger.error({ url, err: describeError(err) }, 'Slow path failed, allowing request');
      return FAIL_OPEN;
    }

    const metadata = await this.deps.fetcher.fetch(url);
    return this.decideWithMetadata(metadata);
  }

  private classifyPage(metadata: PageMetadata, mission: Mission): MetadataDecision {
    const { url } = metadata;
    const features = extractFeatures(metadata, mission, { now: this.now(), logger: this.logger });
    const result = classify(this.deps.classifier.network, features, this.deps.threshold);

    this.deps.stats.recordSlowPath();
    this.persist({
      url,
      mission: mission.missionText,
      features,
      action: result.action,
      confidence: result.confidence,
      timestamp: this.now().getTime()
    });
    this.deps.cache.put(url, { ...result, source: 'classifier' });

    this.logger.info(
      { url, action: result.action, confidence: Number(result.confidence.toFixed(3)), title: metadata.title.slice(0, 50) },
      'Classifier verdict'
    );
    return result;
  }

  private persist(decision: Parameters<DecisionStore['record']>[0]): void {
    const store = this.deps.store;
    if (!store) {
      this.logger.debug({ url: decision.url }, 'Decision store unavailable, decision not recorded');
      return;
    }

    try {
      store.record(decision);
    } catch (err) {
      this.logger.warn({ url: decision.url, err: describeError(err) }, 'Decision not recorded');
    }
  }

  /**
   * Marks the newest unreviewed decision for this URL under the current mission as right or
   * wrong. Returns false when there is nothing to attach feedback to.
   */
  submitFeedback(url: string, wasCorrect: boolean): boolean {
    const store = this.deps.store;
    if (!store) {
      this.logger.warn({ url }, 'Feedback ignored, decision store unavailable');
      return false;
    }

    try {
      const updated = store.attachFeedback(url, this.mission?.missionText ?? '', wasCorrect);
      if (!updated) return false;

      this.deps.stats.recordFeedback(wasCorrect);
      this.logger.info({ url, correct: wasCorrect, decision_id: updated.id }, 'Feedback recorded');
      return true;
    } catch (err) {
      this.logger.warn({ url, err: describeError(err) }, 'Feedback not recorded');
      return false;
    }
  }

  stats(): EngineStats {
    return {
      ...this.deps.stats.snapshot(),
      mission: this.mission?.missionText ?? null,
      cacheSize: this.deps.cache.size,
      decisionThreshold: this.deps.threshold,
      classifierTrained: this.deps.classifier.trained,
      storeAvailable: this.deps.store !== undefined
    };
  }
}
