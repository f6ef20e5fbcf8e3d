import type { AttributeValues } from '../core/annotation.js';
import { Layer } from '../core/layer.js';
import type { Text } from '../core/text.js';
import { resolveSpanConflicts, type ConflictStrategy } from '../operations/conflict-resolver.js';
import type { Tagger } from './tagger.js';

/** One pattern and the attribute values its matches carry. */
export interface RegexRule {
  pattern: RegExp;
  attributes?: AttributeValues;
  /** Lower values win overlaps. Defaults to 0. */
  priority?: number;
  /** Capture group whose bounds become the span. Defaults to the whole match. */
  group?: number;
}

export interface RegexTaggerOptions {
  outputLayer: string;
  outputAttributes?: readonly string[];
  rules: readonly RegexRule[];
  strategy?: ConflictStrategy;
  /** Keep every rule that matches the same location as separate annotations. */
  ambiguous?: boolean;
}

interface RuleMatch {
  start: number;
  end: number;
  values: { priority: number };
  attributes: AttributeValues;
}

/**
 * Rule-based span tagger: matches every rule over the raw text and settles
 * overlaps with the conflict resolver before building an independent layer.
 */
export class RegexTagger implements Tagger {
  readonly outputLayer: string;
  readonly outputAttributes: readonly string[];
  readonly inputLayers: readonly string[] = [];
  private readonly rules: readonly RegexRule[];
  private readonly strategy: ConflictStrategy;
  private readonly ambiguous: boolean;

  constructor(options: RegexTaggerOptions) {
    this.outputLayer = options.outputLayer;
    this.outputAttributes = [...(options.outputAttributes ?? [])];
    this.strategy = options.strategy ?? 'MAX';
    this.ambiguous = options.ambiguous ?? false;
    this.rules = options.rules.map((rule) => ({
      ...rule,
      pattern: rule.pattern.global ? rule.pattern : new RegExp(rule.pattern.source, `${rule.pattern.flags}g`)
    }));
  }

  makeLayer(text: Text): Layer {
    const layer = new Layer({
      name: this.outputLayer,
      attributes: this.outputAttributes,
      ambiguous: this.ambiguous,
      textObject: text
    });

    const resolved = resolveSpanConflicts(this.collectMatches(text.text), {
      strategy: this.strategy,
      priorityAttribute: 'priority',
      keepEqual: this.ambiguous
    });
    for (const match of resolved) {
      layer.addSpan({ start: match.start, end: match.end }, match.attributes);
    }

    return layer;
  }

  private collectMatches(raw: string): RuleMatch[] {
    const matches: RuleMatch[] = [];
    for (const rule of this.rules) {
      for (const match of raw.matchAll(rule.pattern)) {
        const bounds = matchBounds(match, rule.group ?? 0);
        if (bounds) {
          matches.push({
            ...bounds,
            values: { priority: rule.priority ?? 0 },
            attributes: rule.attributes ?? {}
          });
        }
      }
    }
    return matches;
  }
}

/** Bounds of a group within a match; requires the `d` flag for groups other than 0. */
function matchBounds(match: RegExpMatchArray, group: number): { start: number; end: number } | undefined {
  if (group === 0) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    return end > start ? { start, end } : undefined;
  }

  const indices = match.indices?.[group];
  if (!indices) {
    return undefined;
  }
  const [start, end] = indices;
  return end > start ? { start, end } : undefined;
}
