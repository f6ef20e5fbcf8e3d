import {
  ConsistencyError,
  DependencyError,
  FragmentOutsideBaseError,
  MissingDependencyError,
  NoMatchingEnvelopedSpanError,
  NoMatchingParentSpanError
} from './errors.js';
import type { Layer } from './layer.js';
import { compareSpans, containsSpan, locationOf, type BaseSpan } from './span.js';

/** Name-to-layer lookup used to validate a layer against the layers it depends on. */
export type LayerLookup = (name: string) => Layer | undefined;

/**
 * Check one span location against the layer's dependency, dispatched on topology.
 * Returns the first violation instead of throwing so callers can pick the error kind.
 */
export function checkSpanAgainstBase(layer: Layer, span: BaseSpan, lookup: LayerLookup): DependencyError | undefined {
  const topology = layer.topology;
  if (topology.kind === 'independent') {
    return undefined;
  }

  const base = lookup(topology.base);
  if (!base) {
    return new MissingDependencyError(layer.name, topology.base);
  }

  switch (topology.kind) {
    case 'parent':
      return base.spanAt(span) ? undefined : new NoMatchingParentSpanError(layer.name, base.name, locationOf(span));
    case 'enveloping': {
      const children = span.kind === 'enveloping' ? span.children : [span];
      const orphan = children.find((child) => !base.spanAt(child));
      return orphan ? new NoMatchingEnvelopedSpanError(layer.name, base.name, locationOf(orphan)) : undefined;
    }
    case 'fragment':
      return base.spans.some((candidate) => containsSpan(candidate, span))
        ? undefined
        : new FragmentOutsideBaseError(layer.name, base.name, locationOf(span));
  }
}

/** First dependency violation of a whole layer. */
export function findDependencyViolation(layer: Layer, lookup: LayerLookup): DependencyError | undefined {
  const topology = layer.topology;
  if (topology.kind === 'independent') {
    return undefined;
  }

  if (!lookup(topology.base)) {
    return new MissingDependencyError(layer.name, topology.base);
  }

  for (const span of layer.spans) {
    const violation = checkSpanAgainstBase(layer, span.base, lookup);
    if (violation) {
      return violation;
    }
  }

  return undefined;
}

/**
 * First structural invariant broken by the layer's span storage:
 * ownership, span kind, order and uniqueness, annotation count and ownership,
 * exact attribute keys, and enveloping child order.
 */
export function findStructuralViolation(layer: Layer): ConsistencyError | undefined {
  const declared = new Set(layer.attributes);
  const expectedKind = layer.topology.kind === 'enveloping' ? 'enveloping' : 'elementary';

  for (let index = 0; index < layer.spans.length; index += 1) {
    const span = layer.spans[index];
    if (!span) {
      return new ConsistencyError('SPAN_MISSING', layer.name, `span slot ${index} is empty`);
    }
    const location = locationOf(span);

    if (span.layer !== layer) {
      return new ConsistencyError('SPAN_FOREIGN', layer.name, `span belongs to layer '${span.layer.name}'`, location);
    }

    if (span.base.kind !== expectedKind) {
      return new ConsistencyError(
        'SPAN_KIND',
        layer.name,
        `expected an ${expectedKind} span, found ${span.base.kind}`,
        location
      );
    }

    const previous = layer.spans[index - 1];
    if (previous) {
      const order = compareSpans(previous, span);
      if (order === 0) {
        return new ConsistencyError('SPAN_DUPLICATE', layer.name, 'location occurs more than once', location);
      }
      if (order > 0) {
        return new ConsistencyError(
          'SPAN_ORDER',
          layer.name,
          `span follows [${previous.start}, ${previous.end}) out of order`,
          location
        );
      }
    }

    if (span.base.kind === 'enveloping') {
      const childViolation = findChildOrderViolation(span.base);
      if (childViolation) {
        return new ConsistencyError('CHILD_ORDER', layer.name, childViolation, location);
      }
    }

    if (span.annotations.length === 0) {
      return new ConsistencyError('ANNOTATION_COUNT', layer.name, 'span has no annotations', location);
    }
    if (!layer.ambiguous && span.annotations.length > 1) {
      return new ConsistencyError(
        'ANNOTATION_COUNT',
        layer.name,
        `unambiguous span has ${span.annotations.length} annotations`,
        location
      );
    }

    for (const annotation of span.annotations) {
      if (annotation.span !== span) {
        return new ConsistencyError('ANNOTATION_FOREIGN', layer.name, 'annotation belongs to another span', location);
      }

      const keys = annotation.keys();
      const missing = layer.attributes.filter((name) => !annotation.has(name));
      const extra = keys.filter((name) => !declared.has(name));
      if (missing.length > 0 || extra.length > 0) {
        const detail = [
          missing.length > 0 ? `missing ${missing.join(', ')}` : '',
          extra.length > 0 ? `undeclared ${extra.join(', ')}` : ''
        ]
          .filter((part) => part.length > 0)
          .join('; ');
        return new ConsistencyError('ANNOTATION_ATTRIBUTES', layer.name, `annotation has ${detail}`, location);
      }
    }
  }

  return undefined;
}

function findChildOrderViolation(span: BaseSpan): string | undefined {
  if (span.kind === 'elementary') {
    return undefined;
  }

  if (span.children.length === 0) {
    return 'enveloping span has no children';
  }

  for (let index = 1; index < span.children.length; index += 1) {
    const previous = span.children[index - 1];
    const current = span.children[index];
    if (previous && current && current.start < previous.end) {
      return `child ${index} overlaps or precedes child ${index - 1}`;
    }
  }

  const first = span.children[0];
  const last = span.children.at(-1);
  if (first && last && (first.start !== span.start || last.end !== span.end)) {
    return 'span boundaries differ from the extent of its children';
  }

  return undefined;
}
