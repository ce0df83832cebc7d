import type { Action } from '../types/index.js';
import { FeedForwardNetwork } from './network.js';

export { FeedForwardNetwork, HIDDEN_SIZES, type DenseLayer } from './network.js';
export { loadClassifier, readWeights, saveWeights, toWeightFile, type LoadedClassifier, type WeightFile } from './weights.js';

export interface Classification {
  action: Action;
  confidence: number;
}

export const DEFAULT_THRESHOLD = 0.5;

/** Allow only when the probability is strictly above the threshold; a tie blocks. */
export function classify(network: FeedForwardNetwork, features: Float32Array, threshold = DEFAULT_THRESHOLD): Classification {
  const probability = network.predict(features);
  return {
    action: probability > threshold ? 'allow' : 'block',
    confidence: probability
  };
}
