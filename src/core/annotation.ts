import { isDeepStrictEqual } from 'node:util';

import { UnknownAttributeError } from './errors.js';
import type { Span } from './layer.js';
import type { SpanText } from './span.js';

/** Attribute bag as passed in by callers and written out to records. */
export type AttributeValues = Readonly<Record<string, unknown>>;

/**
 * One analysis attached to a layer entry. Values are stored as given;
 * reads of a declared but unset attribute fall back to the layer default.
 */
export class Annotation {
  readonly span: Span;
  private readonly data: Map<string, unknown>;

  constructor(span: Span, values: AttributeValues = {}) {
    this.span = span;
    this.data = new Map(Object.entries(values));
  }

  get text(): SpanText {
    return this.span.text;
  }

  /** Read a declared attribute. */
  get(name: string): unknown {
    const layer = this.span.layer;
    if (!layer.attributes.includes(name)) {
      throw new UnknownAttributeError(layer.name, name);
    }

    return this.data.has(name) ? this.data.get(name) : layer.defaultValue(name);
  }

  /** Overwrite a declared attribute in place. */
  set(name: string, value: unknown): void {
    const layer = this.span.layer;
    if (!layer.attributes.includes(name)) {
      throw new UnknownAttributeError(layer.name, name);
    }

    this.data.set(name, value);
  }

  /** Whether the value was stored explicitly (as opposed to a default read). */
  has(name: string): boolean {
    return this.data.has(name);
  }

  /** Stored keys in insertion order. */
  keys(): string[] {
    return [...this.data.keys()];
  }

  /** Stored values: declared attributes in schema order, then any undeclared leftovers. */
  toRecord(): Record<string, unknown> {
    const record: Record<string, unknown> = {};
    for (const name of this.span.layer.attributes) {
      if (this.data.has(name)) {
        record[name] = this.data.get(name);
      }
    }
    for (const [name, value] of this.data) {
      if (!Object.hasOwn(record, name)) {
        record[name] = value;
      }
    }
    return record;
  }

  isEqual(other: Annotation): boolean {
    return isDeepStrictEqual(this.toRecord(), other.toRecord());
  }
}
