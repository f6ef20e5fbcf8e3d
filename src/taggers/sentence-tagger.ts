import { Layer, type Span } from '../core/layer.js';
import type { Text } from '../core/text.js';
import type { Tagger } from './tagger.js';

export interface SentenceTaggerOptions {
  outputLayer?: string;
  inputLayer?: string;
  /** Token texts that end a sentence. */
  terminators?: readonly string[];
}

const DEFAULT_TERMINATORS = ['.', '!', '?', '…'];

/**
 * Groups tokens into an enveloping sentences layer. A sentence ends after a
 * run of terminator tokens; trailing tokens form a final sentence.
 */
export class SentenceTagger implements Tagger {
  readonly outputLayer: string;
  readonly outputAttributes: readonly string[] = [];
  readonly inputLayers: readonly string[];
  private readonly inputLayer: string;
  private readonly terminators: ReadonlySet<string>;

  constructor(options: SentenceTaggerOptions = {}) {
    this.outputLayer = options.outputLayer ?? 'sentences';
    this.inputLayer = options.inputLayer ?? 'tokens';
    this.inputLayers = [this.inputLayer];
    this.terminators = new Set(options.terminators ?? DEFAULT_TERMINATORS);
  }

  makeLayer(text: Text, layers: ReadonlyMap<string, Layer>): Layer {
    const layer = new Layer({ name: this.outputLayer, enveloping: this.inputLayer, textObject: text });
    const tokens = layers.get(this.inputLayer)?.spans ?? [];

    let current: Span[] = [];
    tokens.forEach((token, index) => {
      current.push(token);
      const next = tokens[index + 1];
      if (this.isTerminator(token, text) && (!next || !this.isTerminator(next, text))) {
        layer.addEnvelopingSpan(current);
        current = [];
      }
    });
    if (current.length > 0) {
      layer.addEnvelopingSpan(current);
    }

    return layer;
  }

  private isTerminator(token: Span, text: Text): boolean {
    return this.terminators.has(text.text.slice(token.start, token.end));
  }
}
