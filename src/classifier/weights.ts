import { readFileSync, writeFileSync, existsSync } from 'fs';
import type { Logger } from 'pino';
import { z } from 'zod';
import { ModelLoadError, describeError } from '../errors.js';
import { FeedForwardNetwork } from './network.js';

export const WEIGHT_FORMAT = 'focus-gate-weights';
export const WEIGHT_VERSION = 1;

const weightFileSchema = z.object({
  format: z.literal(WEIGHT_FORMAT),
  version: z.literal(WEIGHT_VERSION),
  inputSize: z.number().int().positive(),
  layers: z.array(
    z.object({
      weights: z.array(z.array(z.number())),
      bias: z.array(z.number())
    })
  )
});

export type WeightFile = z.infer<typeof weightFileSchema>;

export interface LoadedClassifier {
  network: FeedForwardNetwork;
  trained: boolean;
  source?: string;
}

export function toWeightFile(network: FeedForwardNetwork): WeightFile {
  return {
    format: WEIGHT_FORMAT,
    version: WEIGHT_VERSION,
    inputSize: network.inputSize,
    layers: network.layers.map(layer => ({
      weights: layer.weights.map(row => Array.from(row)),
      bias: Array.from(layer.bias)
    }))
  };
}

export function saveWeights(path: string, network: FeedForwardNetwork): void {
  writeFileSync(path, JSON.stringify(toWeightFile(network)));
}

export function readWeights(path: string, inputSize: number): FeedForwardNetwork {
  if (!existsSync(path)) {
    throw new ModelLoadError(`Weight file not found at ${path}`);
  }

  let file: WeightFile;
  try {
    file = weightFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  } catch (err) {
    throw new ModelLoadError(`Weight file ${path} is unreadable: ${describeError(err)}`, { cause: err });
  }

  if (file.inputSize !== inputSize) {
    throw new ModelLoadError(`Weight file expects ${file.inputSize} features, extractor produces ${inputSize}`);
  }

  try {
    return new FeedForwardNetwork(
      file.inputSize,
      file.layers.map(layer => ({
        weights: layer.weights.map(row => Float32Array.from(row)),
        bias: Float32Array.from(layer.bias)
      }))
    );
  } catch (err) {
    throw new ModelLoadError(`Weight file ${path} has the wrong shape: ${describeError(err)}`, { cause: err });
  }
}

/**
 * Loads trained weights once at startup. A missing or corrupt file is not fatal: the
 * classifier starts untrained and its verdicts are close to random until weights exist.
 */
export function loadClassifier(path: string, inputSize: number, logger: Logger): LoadedClassifier {
  try {
    const network = readWeights(path, inputSize);
    logger.info({ path }, 'Classifier weights loaded');
    return { network, trained: true, source: path };
  } catch (err) {
    logger.warn({ path, err: describeError(err) }, 'Classifier weights unavailable, serving with an untrained network');
    return { network: FeedForwardNetwork.untrained(inputSize), trained: false };
  }
}
