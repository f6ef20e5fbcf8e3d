import { describe, expect, it } from 'vitest';

import {
  Layer,
  loadText,
  resolveConflicts,
  saveText,
  tagText,
  Text,
  TokensTagger
} from '../../src/public/index.js';

function taggedText(): Text {
  const text = new Text('Päike paistab.');
  tagText(text, new TokensTagger());
  const lemmas = new Layer({ name: 'lemmas', attributes: ['lemma'], parent: 'tokens', textObject: text });
  lemmas.addSpan({ start: 0, end: 5 }, { lemma: 'päike' });
  lemmas.addSpan({ start: 6, end: 13 }, { lemma: 'paistma' });
  text.addLayer(lemmas);
  return text;
}

describe('public API', () => {
  it('saves JSON by default and loads it back', () => {
    const json = saveText(taggedText());
    const { text, diagnostics } = loadText(json);

    expect(json.startsWith('{"text":"Päike paistab."')).toBe(true);
    expect(diagnostics).toEqual([]);
    expect(text?.layerNames()).toEqual(['tokens', 'lemmas']);
    expect(text?.layer('lemmas').attributeValues('lemma').values).toEqual(['päike', 'paistma']);
  });

  it('detects TCF input and honours custom layer names', () => {
    const xml = saveText(taggedText(), { format: 'tcf' });
    const { text, diagnostics } = loadText(xml, { lemmas: { layer: 'lemma_layer', attribute: 'base' } });

    expect(xml.startsWith('<?xml')).toBe(true);
    expect(diagnostics).toEqual([]);
    expect(text?.layerNames()).toEqual(['tokens', 'lemma_layer']);
    expect(text?.layer('lemma_layer').attributeValues('base').values).toEqual([['päike'], ['paistma']]);
  });

  it('honours an explicit format over detection', () => {
    const { text, diagnostics } = loadText('<D-Spin/>', { format: 'json' });

    expect(text).toBeUndefined();
    expect(diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['JSON_NOT_WELL_FORMED']);
  });

  it('exposes conflict resolution over attached layers', () => {
    const text = new Text('abcdefghij');
    const chunks = new Layer({ name: 'chunks', textObject: text }).fromRecords([
      { start: 0, end: 5 },
      { start: 2, end: 7 },
      { start: 6, end: 9 }
    ]);
    text.addLayer(chunks);

    expect(resolveConflicts(chunks, { strategy: 'MIN' }).text).toEqual(['abcde', 'ghi']);
    expect(chunks.length).toBe(3);
  });
});
