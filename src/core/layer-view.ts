import { EmptySelectionError, SelectionError } from './errors.js';
import type { Layer, Span } from './layer.js';
import type { SpanText } from './span.js';

/** Column of one attribute in span order, shaped by the layer's ambiguity. */
export type AttributeList =
  | { readonly ambiguous: false; readonly attribute: string; readonly values: unknown[] }
  | { readonly ambiguous: true; readonly attribute: string; readonly values: unknown[][] };

/** Several attribute columns zipped per annotation. */
export type AttributeTupleList =
  | { readonly ambiguous: false; readonly attributes: readonly string[]; readonly values: unknown[][] }
  | { readonly ambiguous: true; readonly attributes: readonly string[]; readonly values: unknown[][][] };

/** Index list, boolean mask, or span predicate. */
export type SpanSelector = readonly number[] | readonly boolean[] | ((span: Span, index: number) => boolean);

export interface SelectOptions {
  /** When false, a selection that matches nothing throws `EmptySelectionError`. Defaults to true. */
  allowEmpty?: boolean;
}

/** Read-only ordered view over a subset of one layer's spans. */
export class LayerView implements Iterable<Span> {
  readonly layer: Layer;
  readonly spans: readonly Span[];

  constructor(layer: Layer, spans: readonly Span[]) {
    this.layer = layer;
    this.spans = spans;
  }

  get length(): number {
    return this.spans.length;
  }

  [Symbol.iterator](): Iterator<Span> {
    return this.spans[Symbol.iterator]();
  }

  at(index: number): Span | undefined {
    return this.spans.at(index);
  }

  get text(): SpanText[] {
    return this.spans.map((span) => span.text);
  }

  slice(start?: number, end?: number): LayerView {
    return new LayerView(this.layer, this.spans.slice(start, end));
  }

  select(selector: SpanSelector, options: SelectOptions = {}): LayerView {
    return new LayerView(this.layer, selectSpans(this.layer.name, this.spans, selector, options));
  }

  attributeValues(name: string): AttributeList {
    return collectAttribute(this.layer, this.spans, name);
  }

  attributeTuples(names: readonly string[]): AttributeTupleList {
    return collectAttributeTuples(this.layer, this.spans, names);
  }
}

/**
 * Apply a selector to a span list, keeping span order.
 * Index lists are deduplicated and returned in span order; negative indexes
 * count from the end. An empty selector array is rejected outright since it
 * cannot be told apart as a mask or an index list.
 */
export function selectSpans(
  layerName: string,
  spans: readonly Span[],
  selector: SpanSelector,
  options: SelectOptions
): Span[] {
  let selected: Span[];

  if (typeof selector === 'function') {
    const predicate = selector;
    selected = spans.filter((span, index) => predicate(span, index));
  } else if (selector.length === 0) {
    throw new EmptySelectionError(`Empty selector on layer '${layerName}'.`);
  } else if (isMask(selector)) {
    const mask = selector;
    if (mask.length !== spans.length) {
      throw new SelectionError(
        `Mask of length ${mask.length} does not match ${spans.length} spans of layer '${layerName}'.`
      );
    }
    selected = spans.filter((_span, index) => mask[index] === true);
  } else {
    const indexes = new Set<number>();
    for (const raw of selector) {
      const index = raw < 0 ? spans.length + raw : raw;
      if (!Number.isInteger(raw) || index < 0 || index >= spans.length) {
        throw new SelectionError(`Index ${raw} is out of range for layer '${layerName}'.`, 'INDEX_OUT_OF_RANGE');
      }
      indexes.add(index);
    }
    selected = [...indexes].sort((left, right) => left - right).flatMap((index) => spans[index] ?? []);
  }

  if (selected.length === 0 && options.allowEmpty === false) {
    throw new EmptySelectionError(`Selection on layer '${layerName}' matched no spans.`);
  }

  return selected;
}

/** Build one attribute column over `spans`. */
export function collectAttribute(layer: Layer, spans: readonly Span[], name: string): AttributeList {
  layer.assertAttribute(name);
  if (layer.ambiguous) {
    return { ambiguous: true, attribute: name, values: spans.map((span) => span.values(name)) };
  }

  return { ambiguous: false, attribute: name, values: spans.map((span) => span.get(name)) };
}

/** Build a zipped multi-attribute column over `spans`. */
export function collectAttributeTuples(
  layer: Layer,
  spans: readonly Span[],
  names: readonly string[]
): AttributeTupleList {
  for (const name of names) {
    layer.assertAttribute(name);
  }

  if (layer.ambiguous) {
    return {
      ambiguous: true,
      attributes: [...names],
      values: spans.map((span) => span.annotations.map((annotation) => names.map((name) => annotation.get(name))))
    };
  }

  return {
    ambiguous: false,
    attributes: [...names],
    values: spans.map((span) => names.map((name) => span.get(name)))
  };
}

function isMask(selector: readonly number[] | readonly boolean[]): selector is readonly boolean[] {
  for (const entry of selector) {
    if (typeof entry !== 'boolean') {
      return false;
    }
  }
  return true;
}
