import type { AttributeValues } from '../core/annotation.js';
import { Layer } from '../core/layer.js';
import type { Text } from '../core/text.js';
import type { ResourceHandle } from './resource.js';
import type { Tagger } from './tagger.js';

/** Word-level analyzer returning zero or more analyses per word. */
export interface Analyzer {
  analyze(word: string): readonly AttributeValues[];
}

export interface AnalyzerTaggerOptions {
  outputLayer?: string;
  inputLayer?: string;
  outputAttributes: readonly string[];
  analyzer: ResourceHandle<Analyzer>;
  defaults?: AttributeValues;
}

/**
 * Ambiguous, parent-attached analysis layer: one annotation per analysis of
 * each input span. Words without analyses get a single annotation of
 * default values. Keys outside the declared attributes are dropped.
 */
export class AnalyzerTagger implements Tagger {
  readonly outputLayer: string;
  readonly outputAttributes: readonly string[];
  readonly inputLayers: readonly string[];
  private readonly inputLayer: string;
  private readonly analyzer: ResourceHandle<Analyzer>;
  private readonly defaults: AttributeValues;

  constructor(options: AnalyzerTaggerOptions) {
    this.outputLayer = options.outputLayer ?? 'morph_analysis';
    this.inputLayer = options.inputLayer ?? 'tokens';
    this.inputLayers = [this.inputLayer];
    this.outputAttributes = [...options.outputAttributes];
    this.analyzer = options.analyzer;
    this.defaults = options.defaults ?? {};
  }

  makeLayer(text: Text, layers: ReadonlyMap<string, Layer>): Layer {
    const layer = new Layer({
      name: this.outputLayer,
      attributes: this.outputAttributes,
      ambiguous: true,
      defaults: this.defaults,
      parent: this.inputLayer,
      textObject: text
    });
    const words = layers.get(this.inputLayer)?.spans ?? [];

    this.analyzer.use((analyzer) => {
      for (const word of words) {
        const analyses = analyzer.analyze(text.text.slice(word.start, word.end));
        if (analyses.length === 0) {
          layer.addSpan(word.base);
          continue;
        }
        for (const analysis of analyses) {
          layer.addSpan(word.base, this.project(analysis));
        }
      }
    });

    return layer;
  }

  private project(analysis: AttributeValues): Record<string, unknown> {
    const values: Record<string, unknown> = {};
    for (const attribute of this.outputAttributes) {
      if (Object.hasOwn(analysis, attribute)) {
        values[attribute] = analysis[attribute];
      }
    }
    return values;
  }
}
