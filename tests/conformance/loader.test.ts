import { mkdtemp, mkdir, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadTaggerCases, parseTaggerCase, TaggerCaseError } from '../../src/testkit/tagger-fixtures.js';

describe('tagger case loader', () => {
  it('loads repository cases sorted by id', async () => {
    const cases = await loadTaggerCases(path.resolve('fixtures/taggers'));

    expect(cases.map((record) => record.testCase.id)).toEqual([
      'regex-entities',
      'sentences-abbreviation',
      'sentences-two',
      'tokens-basic'
    ]);
    expect(cases.find((record) => record.testCase.id === 'sentences-abbreviation')?.testCase.status).toBe('skip');
    expect(cases.find((record) => record.testCase.id === 'tokens-basic')?.testCase.status).toBe('active');
    expect(cases.find((record) => record.testCase.id === 'regex-entities')?.casePath.endsWith('.case.yml')).toBe(true);
  });

  it('fails on an invalid case file', async () => {
    const tempDir = await mkdtemp(path.join(os.tmpdir(), 'tagger-cases-'));
    const caseDir = path.join(tempDir, 'bad');
    await mkdir(caseDir, { recursive: true });
    await writeFile(
      path.join(caseDir, 'broken.case.yaml'),
      ['id: broken', 'description: bad status', 'text: x', 'status: maybe', 'expected: {}'].join('\n'),
      'utf8'
    );

    await expect(loadTaggerCases(tempDir)).rejects.toBeInstanceOf(TaggerCaseError);
  });

  it('validates each field', () => {
    const valid = { id: 'a', description: 'b', text: 'c', expected: {} };

    expect(parseTaggerCase('valid.case.yaml', valid)).toEqual({
      id: 'a',
      description: 'b',
      text: 'c',
      status: 'active',
      input_layers: [],
      expected: {}
    });
    expect(() => parseTaggerCase('list.case.yaml', [])).toThrow(TaggerCaseError);
    expect(() => parseTaggerCase('id.case.yaml', { ...valid, id: ' ' })).toThrow("missing or invalid 'id'");
    expect(() => parseTaggerCase('text.case.yaml', { ...valid, text: 3 })).toThrow("missing or invalid 'text'");
    expect(() => parseTaggerCase('inputs.case.yaml', { ...valid, input_layers: ['tokens'] })).toThrow(
      "'input_layers' must be a list of layer records"
    );
    expect(() => parseTaggerCase('expected.case.yaml', { ...valid, expected: [] })).toThrow(
      "'expected' must be a layer record"
    );
  });
});
