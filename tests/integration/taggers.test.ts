import { describe, expect, it } from 'vitest';

import type { AttributeValues } from '../../src/core/annotation.js';
import {
  ConsistencyError,
  MissingDependencyError,
  NoMatchingParentSpanError,
  ResourceClosedError,
  TaggerContractError
} from '../../src/core/errors.js';
import { Layer, Span } from '../../src/core/layer.js';
import { createSpan } from '../../src/core/span.js';
import { Text } from '../../src/core/text.js';
import { AnalyzerTagger, type Analyzer } from '../../src/taggers/analyzer-tagger.js';
import { AnnotationRewriter } from '../../src/taggers/annotation-rewriter.js';
import { RegexTagger } from '../../src/taggers/regex-tagger.js';
import { ResourceHandle } from '../../src/taggers/resource.js';
import { SentenceTagger } from '../../src/taggers/sentence-tagger.js';
import { retagText, tagText, type Tagger } from '../../src/taggers/tagger.js';
import { TokensTagger } from '../../src/taggers/tokens-tagger.js';

const LEXICON = new Map<string, AttributeValues[]>([
  ['Tere', [{ lemma: 'tere', pos: 'I' }]],
  [
    'maailm',
    [
      { lemma: 'maailm', pos: 'S' },
      { lemma: 'maa', pos: 'S', form: 'sg n' }
    ]
  ]
]);

function lexiconHandle(): ResourceHandle<Analyzer> {
  return new ResourceHandle<Analyzer>('lexicon', () => ({ analyze: (word: string) => LEXICON.get(word) ?? [] }));
}

function morphTagger(handle: ResourceHandle<Analyzer> = lexiconHandle()): AnalyzerTagger {
  return new AnalyzerTagger({ outputAttributes: ['lemma', 'pos'], analyzer: handle, defaults: { pos: 'Z' } });
}

function analysedText(): Text {
  const text = new Text('Tere, maailm!');
  tagText(text, new TokensTagger());
  tagText(text, morphTagger());
  return text;
}

describe('tokens and sentences', () => {
  it('splits words, hyphenated words and punctuation', () => {
    const text = new Text('Kas e-post töötab? Jah!');
    tagText(text, new TokensTagger());
    expect(text.layer('tokens').text).toEqual(['Kas', 'e-post', 'töötab', '?', 'Jah', '!']);
  });

  it('ends sentences after a run of terminators', () => {
    const text = new Text('Mis?! Ei. Aga');
    tagText(text, new TokensTagger());
    tagText(text, new SentenceTagger());

    expect(text.layer('sentences').text).toEqual([['Mis', '?', '!'], ['Ei', '.'], ['Aga']]);
    expect(text.layer('sentences').at(1)?.enclosingText).toBe('Ei.');
  });

  it('needs its input layer attached', () => {
    const text = new Text('Tere.');
    expect(() => tagText(text, new SentenceTagger())).toThrow(MissingDependencyError);
    expect(text.layerNames()).toEqual([]);
  });
});

describe('RegexTagger', () => {
  const sample = 'Helista 555-1234 homme kell 10';

  it('lets stronger rules win overlaps', () => {
    const text = new Text(sample);
    const layer = tagText(
      text,
      new RegexTagger({
        outputLayer: 'entities',
        outputAttributes: ['type'],
        rules: [
          { pattern: /\d+/, attributes: { type: 'number' }, priority: 1 },
          { pattern: /\d{3}-\d{4}/, attributes: { type: 'phone' }, priority: 0 }
        ]
      })
    );

    expect(layer.text).toEqual(['555-1234', '10']);
    expect(layer.attributeValues('type').values).toEqual(['phone', 'number']);
  });

  it('uses capture group bounds', () => {
    const text = new Text(sample);
    const layer = tagText(text, new RegexTagger({ outputLayer: 'times', rules: [{ pattern: /kell (\d+)/d, group: 1 }] }));
    expect(layer.text).toEqual(['10']);
  });

  it('keeps equal-priority readings on ambiguous layers', () => {
    const text = new Text('kell 10');
    const layer = tagText(
      text,
      new RegexTagger({
        outputLayer: 'readings',
        outputAttributes: ['type'],
        ambiguous: true,
        rules: [
          { pattern: /\d+/, attributes: { type: 'hour' } },
          { pattern: /\d+/, attributes: { type: 'count' } }
        ]
      })
    );

    expect(layer.attributeValues('type').values).toEqual([['hour', 'count']]);
  });
});

describe('AnalyzerTagger', () => {
  it('adds one annotation per analysis and defaults for unknown words', () => {
    const text = analysedText();
    const morph = text.layer('morph_analysis');

    expect(morph.parent).toBe('tokens');
    expect(morph.attributeValues('lemma').values).toEqual([['tere'], [null], ['maailm', 'maa'], [null]]);
    expect(morph.attributeValues('pos').values).toEqual([['I'], ['Z'], ['S', 'S'], ['Z']]);
    expect(text.layer('tokens').at(2)?.resolve('lemma')).toEqual(['maailm', 'maa']);
  });

  it('opens the analyzer once and refuses to run after it is closed', () => {
    let opened = 0;
    const handle = new ResourceHandle<Analyzer>('lexicon', () => {
      opened += 1;
      return { analyze: () => [] };
    });
    const tagger = morphTagger(handle);

    for (const raw of ['üks', 'kaks']) {
      const text = new Text(raw);
      tagText(text, new TokensTagger());
      tagText(text, tagger);
    }
    expect(opened).toBe(1);

    handle.close();
    const text = new Text('kolm');
    tagText(text, new TokensTagger());
    expect(() => tagText(text, tagger)).toThrow(ResourceClosedError);
    expect(text.layerNames()).toEqual(['tokens']);
  });
});

describe('retagging', () => {
  it('swaps in the rewritten layer', () => {
    const text = analysedText();
    const before = text.layer('morph_analysis');
    const rewriter = new AnnotationRewriter({
      outputLayer: 'morph_analysis',
      rewrite: (values) =>
        values.lemma === 'maa' ? undefined : { ...values, pos: String(values.pos).toLowerCase() }
    });

    const after = retagText(text, rewriter);

    expect(text.layer('morph_analysis')).toBe(after);
    expect(before.bound).toBe(false);
    expect(before.attributeValues('lemma').values).toEqual([['tere'], [null], ['maailm', 'maa'], [null]]);
    expect(after.attributeValues('lemma').values).toEqual([['tere'], [null], ['maailm'], [null]]);
    expect(after.attributeValues('pos').values).toEqual([['i'], ['z'], ['s'], ['z']]);
  });

  it('leaves the text untouched when the result breaks a dependant', () => {
    const text = analysedText();
    const tokens = text.layer('tokens');
    const dropComma = new AnnotationRewriter({
      outputLayer: 'tokens',
      rewrite: (values, span) => (span.start === 4 ? undefined : values)
    });

    expect(() => retagText(text, dropComma)).toThrow(NoMatchingParentSpanError);
    expect(text.layer('tokens')).toBe(tokens);
    expect(tokens.length).toBe(4);
    expect(tokens.bound).toBe(true);
  });

  it('checks declared input layers', () => {
    const text = analysedText();
    const rewriter = new AnnotationRewriter({
      outputLayer: 'morph_analysis',
      inputLayers: ['sentences'],
      rewrite: (values) => values
    });
    expect(() => retagText(text, rewriter)).toThrow(MissingDependencyError);
  });
});

describe('tagger contract', () => {
  function fixedTagger(overrides: Partial<Tagger> & Pick<Tagger, 'makeLayer'>): Tagger {
    return { outputLayer: 'words', outputAttributes: [], inputLayers: [], ...overrides };
  }

  it('rejects a layer with another name or attribute set', () => {
    const text = new Text('sõna');
    const misnamed = fixedTagger({ makeLayer: (target) => new Layer({ name: 'tokens', textObject: target }) });
    const extraAttributes = fixedTagger({
      makeLayer: (target) => new Layer({ name: 'words', attributes: ['lemma'], textObject: target })
    });

    expect(() => tagText(text, misnamed)).toThrow(TaggerContractError);
    expect(() => tagText(text, extraAttributes)).toThrow(TaggerContractError);
    expect(text.layerNames()).toEqual([]);
  });

  it('rejects inconsistent span storage before attaching', () => {
    const text = new Text('üks kaks');
    const unsorted = fixedTagger({
      makeLayer: (target) => {
        const layer = new Layer({ name: 'words', textObject: target });
        for (const base of [createSpan(4, 8), createSpan(0, 3)]) {
          const span = new Span(layer, base);
          span.addAnnotation();
          layer.spans.push(span);
        }
        return layer;
      }
    });

    expect(() => tagText(text, unsorted)).toThrow(ConsistencyError);
    expect(text.hasLayer('words')).toBe(false);
  });
});
