import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import pino from 'pino';
import { FeedForwardNetwork, HIDDEN_SIZES, type DenseLayer } from '../classifier/index.js';
import { FEATURE_DIMENSION } from '../features/extractor.js';
import { loadPolicyProfile } from '../rules/index.js';
import { DecisionCache } from '../engine/cache.js';
import { Statistics } from '../engine/stats.js';
import { BoundedMetadataFetcher, DEFAULT_FETCHER_OPTIONS, type MetadataSource } from '../engine/metadata-fetcher.js';
import { DecisionEngine } from '../engine/engine.js';
import { DecisionStore } from '../store/decision-store.js';
import { ProcessSpawnError } from '../errors.js';
import type { EnforcementHandle, EnforcementLauncher } from '../session/index.js';

export const silentLogger = pino({ level: 'silent' });

export function tempDir(prefix = 'focus-gate-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** All-zero weights; the output is sigmoid(outputBias) for every input. */
export function constantNetwork(inputSize: number, outputBias: number): FeedForwardNetwork {
  const sizes = [inputSize, ...HIDDEN_SIZES, 1];
  const layers: DenseLayer[] = [];
  for (let i = 0; i < sizes.length - 1; i++) {
    const outputs = sizes[i + 1];
    layers.push({
      weights: Array.from({ length: outputs }, () => new Float32Array(sizes[i])),
      bias: new Float32Array(outputs)
    });
  }
  layers[layers.length - 1].bias[0] = outputBias;
  return new FeedForwardNetwork(inputSize, layers);
}

export const FIXED_NOW = new Date(2026, 0, 5, 10, 30);

export interface TestEngineOptions {
  network?: FeedForwardNetwork;
  store?: DecisionStore | null;
  source?: MetadataSource;
}

export function createTestEngine(options: TestEngineOptions = {}) {
  const cache = new DecisionCache();
  const stats = new Statistics(silentLogger);
  const store = options.store === null ? undefined : (options.store ?? new DecisionStore(':memory:'));
  const fetcher = new BoundedMetadataFetcher(options.source, DEFAULT_FETCHER_OPTIONS, silentLogger);
  const engine = new DecisionEngine({
    policy: loadPolicyProfile(),
    classifier: { network: options.network ?? constantNetwork(FEATURE_DIMENSION, 2), trained: true },
    cache,
    stats,
    store,
    fetcher,
    logger: silentLogger,
    threshold: 0.5,
    now: () => FIXED_NOW
  });
  return { engine, cache, stats, store, fetcher };
}

export class FakeHandle implements EnforcementHandle {
  alive = true;
  stopped = false;

  constructor(readonly pid: number) {}

  isAlive(): boolean {
    return this.alive;
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.alive = false;
  }
}

export class FakeLauncher implements EnforcementLauncher {
  fail = false;
  launches = 0;
  readonly handles: FakeHandle[] = [];

  async launch(): Promise<EnforcementHandle> {
    this.launches++;
    if (this.fail) {
      throw new ProcessSpawnError('proxy binary missing');
    }
    const handle = new FakeHandle(1000 + this.launches);
    this.handles.push(handle);
    return handle;
  }
}
