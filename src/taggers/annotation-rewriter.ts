import { Annotation, type AttributeValues } from '../core/annotation.js';
import type { Layer, Span } from '../core/layer.js';
import type { Retagger } from './tagger.js';

/** Returns the new values, or `undefined` to drop the annotation. */
export type AnnotationRewrite = (values: Readonly<Record<string, unknown>>, span: Span) => AttributeValues | undefined;

export interface AnnotationRewriterOptions {
  outputLayer: string;
  inputLayers?: readonly string[];
  rewrite: AnnotationRewrite;
}

/**
 * Retagger mapping every annotation of a layer through `rewrite`. Spans
 * left without annotations are removed.
 */
export class AnnotationRewriter implements Retagger {
  readonly outputLayer: string;
  readonly inputLayers: readonly string[];
  private readonly rewrite: AnnotationRewrite;

  constructor(options: AnnotationRewriterOptions) {
    this.outputLayer = options.outputLayer;
    this.inputLayers = [...(options.inputLayers ?? [])];
    this.rewrite = options.rewrite;
  }

  changeLayer(layer: Layer): void {
    const kept: Span[] = [];
    for (const span of layer.spans) {
      const rewritten: Annotation[] = [];
      for (const annotation of span.annotations) {
        const values = this.rewrite(annotation.toRecord(), span);
        if (values !== undefined) {
          rewritten.push(new Annotation(span, layer.completeValues(values)));
        }
      }
      span.annotations.splice(0, span.annotations.length, ...rewritten);
      if (rewritten.length > 0) {
        kept.push(span);
      }
    }
    layer.spans.splice(0, layer.spans.length, ...kept);
  }
}
