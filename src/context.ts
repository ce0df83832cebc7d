import { existsSync, mkdirSync } from 'fs';
import type { Logger } from 'pino';
import type { FocusGateConfig } from './config.js';
import { dataPath } from './config.js';
import { describeError } from './errors.js';
import { FEATURE_DIMENSION } from './features/extractor.js';
import { loadPolicyProfile, type PolicyProfile } from './rules/index.js';
import { loadClassifier, type LoadedClassifier } from './classifier/index.js';
import { DecisionStore } from './store/decision-store.js';
import { DecisionCache } from './engine/cache.js';
import { Statistics } from './engine/stats.js';
import { BoundedMetadataFetcher, type MetadataSource } from './engine/metadata-fetcher.js';
import { DecisionEngine } from './engine/engine.js';

/** Everything the decision path needs, built once and handed to collaborators explicitly. */
export interface DecisionContext {
  config: FocusGateConfig;
  policy: PolicyProfile;
  classifier: LoadedClassifier;
  cache: DecisionCache;
  stats: Statistics;
  store?: DecisionStore;
  fetcher: BoundedMetadataFetcher;
  engine: DecisionEngine;
  close(): Promise<void>;
}

export interface ContextOverrides {
  metadataSource?: MetadataSource;
  storePath?: string;
  now?: () => Date;
}

function openStore(path: string, logger: Logger): DecisionStore | undefined {
  try {
    return new DecisionStore(path);
  } catch (err) {
    logger.warn({ path, err: describeError(err) }, 'Decision store unavailable, decisions will not be recorded');
    return undefined;
  }
}

export function createDecisionContext(
  config: FocusGateConfig,
  logger: Logger,
  overrides: ContextOverrides = {}
): DecisionContext {
  if (!existsSync(config.data_dir)) {
    mkdirSync(config.data_dir, { recursive: true });
  }

  const policy = loadPolicyProfile(config.policy.file);
  const classifier = loadClassifier(
    config.classifier.weights ?? dataPath(config, 'models', 'classifier.json'),
    FEATURE_DIMENSION,
    logger.child({ component: 'classifier' })
  );
  const cache = new DecisionCache(config.cache.ttl_seconds * 1000);
  const stats = new Statistics(
    logger.child({ component: 'stats' }),
    dataPath(config, 'stats.json'),
    config.stats.flush_every
  );
  const store = openStore(overrides.storePath ?? dataPath(config, 'decisions.db'), logger);
  const fetcher = new BoundedMetadataFetcher(
    overrides.metadataSource,
    { timeoutMs: config.fetch.timeout_ms, maxConcurrent: config.fetch.max_concurrent },
    logger.child({ component: 'fetcher' })
  );

  const engine = new DecisionEngine({
    policy,
    classifier,
    cache,
    stats,
    store,
    fetcher,
    logger: logger.child({ component: 'engine' }),
    threshold: config.classifier.threshold,
    now: overrides.now
  });

  logger.info(
    { policy: `${policy.name}@${policy.version}`, classifier_trained: classifier.trained },
    'Decision context ready'
  );

  return {
    config,
    policy,
    classifier,
    cache,
    stats,
    store,
    fetcher,
    engine,
    async close() {
      stats.flush();
      await fetcher.stop();
      store?.close();
    }
  };
}
