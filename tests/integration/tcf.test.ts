import { describe, expect, it } from 'vitest';

import { exportTcf, importTcf } from '../../src/converters/tcf.js';
import { UnknownLayerError } from '../../src/core/errors.js';
import { Layer } from '../../src/core/layer.js';
import { Text } from '../../src/core/text.js';
import { SentenceTagger } from '../../src/taggers/sentence-tagger.js';
import { tagText } from '../../src/taggers/tagger.js';
import { TokensTagger } from '../../src/taggers/tokens-tagger.js';

const EXPECTED_TCF = `<?xml version="1.0" encoding="UTF-8"?>
<D-Spin xmlns="http://www.dspin.de/data" version="0.4">
  <MetaData xmlns="http://www.dspin.de/data/metadata"/>
  <TextCorpus xmlns="http://www.dspin.de/data/textcorpus" lang="et">
    <text>Tere, maailm!</text>
    <tokens>
      <token ID="t0" start="0" end="4">Tere</token>
      <token ID="t1" start="4" end="5">,</token>
      <token ID="t2" start="6" end="12">maailm</token>
      <token ID="t3" start="12" end="13">!</token>
    </tokens>
    <sentences>
      <sentence ID="s0" tokenIDs="t0 t1 t2 t3"/>
    </sentences>
    <lemmas>
      <lemma ID="l0" tokenIDs="t0">tere</lemma>
      <lemma ID="l1" tokenIDs="t2">maailm</lemma>
      <lemma ID="l2" tokenIDs="t2">maa</lemma>
    </lemmas>
    <POStags tagset="test-tags">
      <tag ID="pt0" tokenIDs="t0">I</tag>
    </POStags>
  </TextCorpus>
</D-Spin>
`;

const INFERRED_OFFSETS = `<D-Spin xmlns="http://www.dspin.de/data" version="0.4">
  <TextCorpus xmlns="http://www.dspin.de/data/textcorpus" lang="de">
    <text>ja ja nein</text>
    <tokens>
      <token ID="a">ja</token>
      <token ID="b">ja</token>
      <token ID="c" start="6" end="10">nein</token>
    </tokens>
    <sentences>
      <sentence ID="s1" tokenIDs="a b c"/>
    </sentences>
    <lemmas>
      <lemma ID="l0" tokenIDs="z">x</lemma>
      <lemma ID="l1" tokenIDs="c">nein</lemma>
    </lemmas>
  </TextCorpus>
</D-Spin>`;

function annotatedText(): Text {
  const text = new Text('Tere, maailm!');
  tagText(text, new TokensTagger());
  tagText(text, new SentenceTagger());

  const lemmas = new Layer({ name: 'lemmas', attributes: ['lemma'], ambiguous: true, parent: 'tokens', textObject: text });
  lemmas.addSpan({ start: 0, end: 4 }, { lemma: 'tere' });
  lemmas.addSpan({ start: 4, end: 5 });
  lemmas.addSpan({ start: 6, end: 12 }, { lemma: 'maailm' });
  lemmas.addSpan({ start: 6, end: 12 }, { lemma: 'maa' });
  text.addLayer(lemmas);

  const posTags = new Layer({ name: 'pos_tags', attributes: ['pos'], parent: 'tokens', textObject: text });
  posTags.addSpan({ start: 0, end: 4 }, { pos: 'I' });
  text.addLayer(posTags);
  return text;
}

describe('TCF export', () => {
  it('writes tokens, sentences, lemmas and POS tags', () => {
    expect(exportTcf(annotatedText(), { posTagset: 'test-tags' })).toBe(EXPECTED_TCF);
  });

  it('escapes markup in text and tokens', () => {
    const text = new Text('a < b & c');
    tagText(text, new TokensTagger());
    const xml = exportTcf(text, { lang: 'en' });

    expect(xml).toContain('<text>a &lt; b &amp; c</text>');
    expect(xml).toContain('<token ID="t1" start="2" end="3">&lt;</token>');
    expect(xml).toContain('lang="en"');
    expect(importTcf(xml).text?.text).toBe('a < b & c');
  });

  it('requires a tokens layer', () => {
    expect(() => exportTcf(new Text('tühi'))).toThrow(UnknownLayerError);
  });
});

describe('TCF import', () => {
  it('reads back an exported document', () => {
    const { text, diagnostics } = importTcf(EXPECTED_TCF);

    expect(diagnostics).toEqual([]);
    expect(text?.text).toBe('Tere, maailm!');
    expect(text?.meta).toEqual({ lang: 'et' });
    expect(text?.layerNames()).toEqual(['tokens', 'sentences', 'lemmas', 'pos_tags']);
    expect(text?.layer('sentences').at(0)?.text).toEqual(['Tere', ',', 'maailm', '!']);
    expect(text?.layer('lemmas').attributeValues('lemma')).toEqual({
      ambiguous: true,
      attribute: 'lemma',
      values: [['tere'], ['maailm', 'maa']]
    });
    expect(text?.layer('pos_tags').at(0)?.values('pos')).toEqual(['I']);
  });

  it('infers missing offsets and skips unknown token references in lenient mode', () => {
    const { text, diagnostics } = importTcf(INFERRED_OFFSETS, { sourceName: 'inferred.tcf' });

    expect(diagnostics.map(({ code, severity }) => ({ code, severity }))).toEqual([
      { code: 'TCF_OFFSET_INFERRED', severity: 'warning' },
      { code: 'TCF_OFFSET_INFERRED', severity: 'warning' },
      { code: 'TCF_UNKNOWN_TOKEN_ID', severity: 'error' }
    ]);
    expect(diagnostics[2]?.path).toBe('/D-Spin[1]/TextCorpus[1]/lemmas[1]/lemma[1]');
    expect(diagnostics[2]?.source?.name).toBe('inferred.tcf');
    expect(text?.meta).toEqual({ lang: 'de' });
    expect(text?.layer('tokens').text).toEqual(['ja', 'ja', 'nein']);
    expect(text?.layer('tokens').spans.map((span) => [span.start, span.end])).toEqual([
      [0, 2],
      [3, 5],
      [6, 10]
    ]);
    expect(text?.layer('lemmas').attributeValues('lemma').values).toEqual([['nein']]);
  });

  it('returns no text in strict mode when anything was reported', () => {
    const { text, diagnostics } = importTcf(INFERRED_OFFSETS, { mode: 'strict' });

    expect(text).toBeUndefined();
    expect(diagnostics.map((diagnostic) => diagnostic.severity)).toEqual(['error', 'error', 'error']);
  });

  it('reports tokens whose text cannot be located', () => {
    const xml =
      '<D-Spin><TextCorpus><text>üks kaks</text><tokens><token ID="t0">kolm</token><token ID="t1" start="4" end="8">kaks</token></tokens></TextCorpus></D-Spin>';
    const { text, diagnostics } = importTcf(xml);

    expect(diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['TCF_TOKEN_NOT_FOUND']);
    expect(text?.layer('tokens').text).toEqual(['kaks']);
  });

  it('rejects malformed and foreign documents', () => {
    const malformed = importTcf('<D-Spin><TextCorpus></D-Spin>');
    expect(malformed.text).toBeUndefined();
    expect(malformed.diagnostics[0]?.code).toBe('XML_NOT_WELL_FORMED');

    expect(importTcf('<corpus/>').diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['TCF_UNSUPPORTED_ROOT']);
    expect(importTcf('<D-Spin><TextCorpus/></D-Spin>').diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      'TCF_TEXT_MISSING'
    ]);
  });
});
