export const HIDDEN_SIZES = [256, 128, 64] as const;

export interface DenseLayer {
  // Row-major [outputs][inputs]
  weights: Float32Array[];
  bias: Float32Array;
}

function relu(x: number): number {
  return x > 0 ? x : 0;
}

function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

function dense(layer: DenseLayer, input: Float32Array): Float32Array {
  const out = new Float32Array(layer.bias.length);
  for (let j = 0; j < layer.weights.length; j++) {
    const row = layer.weights[j];
    let sum = layer.bias[j];
    for (let i = 0; i < input.length; i++) {
      sum += row[i] * input[i];
    }
    out[j] = sum;
  }
  return out;
}

/**
 * input -> 256 -> 128 -> 64 -> 1, ReLU between hidden layers and a sigmoid output.
 * Training-time dropout sits after the first two hidden layers; at inference it is the
 * identity, so it has no representation here.
 */
export class FeedForwardNetwork {
  readonly inputSize: number;
  readonly layers: DenseLayer[];

  constructor(inputSize: number, layers: DenseLayer[]) {
    const sizes = [inputSize, ...HIDDEN_SIZES, 1];
    if (layers.length !== sizes.length - 1) {
      throw new Error(`Expected ${sizes.length - 1} layers, got ${layers.length}`);
    }

    layers.forEach((layer, index) => {
      const inputs = sizes[index];
      const outputs = sizes[index + 1];
      if (layer.weights.length !== outputs || layer.bias.length !== outputs) {
        throw new Error(`Layer ${index} must have ${outputs} outputs`);
      }
      if (layer.weights.some(row => row.length !== inputs)) {
        throw new Error(`Layer ${index} must take ${inputs} inputs`);
      }
    });

    this.inputSize = inputSize;
    this.layers = layers;
  }

  /** Uniform(-1/sqrt(fanIn), 1/sqrt(fanIn)) initialisation for every weight and bias. */
  static untrained(inputSize: number, random: () => number = Math.random): FeedForwardNetwork {
    const sizes = [inputSize, ...HIDDEN_SIZES, 1];
    const layers: DenseLayer[] = [];

    for (let index = 0; index < sizes.length - 1; index++) {
      const inputs = sizes[index];
      const outputs = sizes[index + 1];
      const bound = 1 / Math.sqrt(inputs);
      const draw = () => (random() * 2 - 1) * bound;

      layers.push({
        weights: Array.from({ length: outputs }, () => Float32Array.from({ length: inputs }, draw)),
        bias: Float32Array.from({ length: outputs }, draw)
      });
    }
    return new FeedForwardNetwork(inputSize, layers);
  }

  predict(input: Float32Array): number {
    if (input.length !== this.inputSize) {
      throw new Error(`Expected ${this.inputSize} features, got ${input.length}`);
    }

    let activations = input;
    const last = this.layers.length - 1;
    for (let index = 0; index < last; index++) {
      activations = dense(this.layers[index], activations).map(relu);
    }
    return sigmoid(dense(this.layers[last], activations)[0]);
  }
}
