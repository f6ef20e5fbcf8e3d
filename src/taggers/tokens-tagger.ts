import { Layer } from '../core/layer.js';
import type { Text } from '../core/text.js';
import type { Tagger } from './tagger.js';

/** Letter/digit runs joined by inner hyphens or apostrophes, or any single other non-space character. */
export const DEFAULT_TOKEN_PATTERN = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*|[^\s\p{L}\p{N}]/gu;

export interface TokensTaggerOptions {
  outputLayer?: string;
  pattern?: RegExp;
}

/** Splits the raw text into an independent, attribute-free tokens layer. */
export class TokensTagger implements Tagger {
  readonly outputLayer: string;
  readonly outputAttributes: readonly string[] = [];
  readonly inputLayers: readonly string[] = [];
  private readonly pattern: RegExp;

  constructor(options: TokensTaggerOptions = {}) {
    this.outputLayer = options.outputLayer ?? 'tokens';
    const pattern = options.pattern ?? DEFAULT_TOKEN_PATTERN;
    this.pattern = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
  }

  makeLayer(text: Text): Layer {
    const layer = new Layer({ name: this.outputLayer, textObject: text });
    const records = [...text.text.matchAll(this.pattern)]
      .filter((match) => match[0].length > 0)
      .map((match) => {
        const start = match.index ?? 0;
        return { start, end: start + match[0].length };
      });
    return layer.fromRecords(records);
  }
}
