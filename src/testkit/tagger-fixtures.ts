import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import { addDiagnostic, createDiagnosticContext, type Diagnostic } from '../core/diagnostics.js';
import { TextLayersError } from '../core/errors.js';
import type { Layer } from '../core/layer.js';
import { isPlainObject, recordToLayer } from '../converters/layer-record.js';
import { recordToText } from '../converters/text-record.js';
import type { Tagger } from '../taggers/tagger.js';
import { diffLayers, type LayerDiff } from './layer-diff.js';

/** Fixture activation status. */
export type TaggerCaseStatus = 'active' | 'skip';

/** One `*.case.yaml` tagger case. Layer fields hold layer records. */
export interface TaggerCase {
  id: string;
  description: string;
  text: string;
  status: TaggerCaseStatus;
  input_layers: Record<string, unknown>[];
  expected: Record<string, unknown>;
}

export interface TaggerCaseRecord {
  casePath: string;
  testCase: TaggerCase;
}

export interface TaggerCaseResult {
  id: string;
  pass: boolean;
  diff?: LayerDiff;
  diagnostics: Diagnostic[];
}

/** Malformed tagger case file. */
export class TaggerCaseError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Tagger case error in ${filePath}: ${message}`);
    this.name = 'TaggerCaseError';
    this.filePath = filePath;
  }
}

const CASE_SUFFIXES = ['.case.yaml', '.case.yml'];

/** Load and validate every tagger case under `rootDir`, sorted by id. */
export async function loadTaggerCases(rootDir: string): Promise<TaggerCaseRecord[]> {
  const casePaths = await findCaseFiles(rootDir);
  const records: TaggerCaseRecord[] = [];

  for (const casePath of casePaths) {
    const raw = await readFile(casePath, 'utf8');
    records.push({ casePath, testCase: parseTaggerCase(casePath, parseYaml(raw)) });
  }

  records.sort((left, right) => left.testCase.id.localeCompare(right.testCase.id));
  return records;
}

async function findCaseFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (CASE_SUFFIXES.some((suffix) => entry.name.endsWith(suffix))) {
        matches.push(fullPath);
      }
    }
  }

  await walk(rootDir);
  return matches;
}

/** Validate the shape of one parsed case document. Layer contents are checked when the case runs. */
export function parseTaggerCase(filePath: string, input: unknown): TaggerCase {
  if (!isPlainObject(input)) {
    throw new TaggerCaseError(filePath, 'case must be a YAML mapping');
  }

  const id = readRequiredString(filePath, input, 'id');
  const description = readRequiredString(filePath, input, 'description');

  const text = input.text;
  if (typeof text !== 'string') {
    throw new TaggerCaseError(filePath, "missing or invalid 'text'");
  }

  const status = input.status ?? 'active';
  if (status !== 'active' && status !== 'skip') {
    throw new TaggerCaseError(filePath, "'status' must be 'active' or 'skip'");
  }

  const inputLayers = input.input_layers ?? [];
  if (!Array.isArray(inputLayers) || !inputLayers.every(isPlainObject)) {
    throw new TaggerCaseError(filePath, "'input_layers' must be a list of layer records");
  }

  const expected = input.expected;
  if (!isPlainObject(expected)) {
    throw new TaggerCaseError(filePath, "'expected' must be a layer record");
  }

  return { id, description, text, status, input_layers: inputLayers, expected };
}

function readRequiredString(filePath: string, obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new TaggerCaseError(filePath, `missing or invalid '${key}'`);
  }
  return value;
}

/**
 * Build the case text with its input layers, run the tagger without
 * attaching its output, and diff the result against the expected layer.
 */
export function runTaggerCase(testCase: TaggerCase, tagger: Tagger): TaggerCaseResult {
  const imported = recordToText(
    { text: testCase.text, meta: {}, layers: testCase.input_layers },
    { mode: 'strict', sourceName: testCase.id }
  );
  const ctx = createDiagnosticContext('strict', testCase.id);
  ctx.diagnostics.push(...imported.diagnostics);

  const text = imported.text;
  if (!text) {
    return { id: testCase.id, pass: false, diagnostics: ctx.diagnostics };
  }

  let expected: Layer;
  let actual: Layer;
  try {
    expected = recordToLayer(testCase.expected, text);
    actual = tagger.makeLayer(text, text.layers);
  } catch (error) {
    if (!(error instanceof TextLayersError)) {
      throw error;
    }
    addDiagnostic(ctx, error.code, 'error', error.message, { layer: tagger.outputLayer });
    return { id: testCase.id, pass: false, diagnostics: ctx.diagnostics };
  }

  const diff = diffLayers(expected, actual);
  return { id: testCase.id, pass: diff.equal, diff, diagnostics: ctx.diagnostics };
}
