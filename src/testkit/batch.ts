import type { Diagnostic } from '../core/diagnostics.js';
import { TextLayersError } from '../core/errors.js';
import type { Text } from '../core/text.js';
import { tagText, type Tagger } from '../taggers/tagger.js';

/** What one corpus run did, per layer and per failure, plus where the time went. */
export interface CorpusSummary {
  texts: number;
  /** Indexes of texts that stopped on an error. */
  failedTexts: number[];
  /** Number of texts each layer was attached to. */
  layerCounts: Record<string, number>;
  /** Error diagnostics by code. */
  errorCodes: Record<string, number>;
  totalMs: number;
  slowestIndex: number | null;
  /** Indexes of texts slower than `budgetMs`. */
  overBudget: number[];
  budgetMs: number | null;
}

export interface BatchOptions {
  /** Texts processed at once. Defaults to 1. */
  concurrency?: number;
  /** Per-text time budget in milliseconds, checked in the summary. */
  budgetMs?: number;
}

/** Outcome for one text of a corpus run. */
export interface TextRunResult {
  index: number;
  /** Layers attached during this run, in tagger order. */
  layers: string[];
  durationMs: number;
  diagnostics: Diagnostic[];
}

export interface CorpusRunResult {
  results: TextRunResult[];
  summary: CorpusSummary;
}

/**
 * Execute asynchronous work with bounded concurrency, returning results in
 * input order.
 */
export async function runWithConcurrency<TInput, TOutput>(
  items: readonly TInput[],
  requestedConcurrency: number,
  worker: (item: TInput, index: number) => Promise<TOutput>
): Promise<TOutput[]> {
  if (items.length === 0) {
    return [];
  }

  // NaN, zero and negative requests run sequentially.
  const concurrency = Math.min(items.length, Math.max(1, Math.floor(requestedConcurrency) || 1));
  const results: TOutput[] = [];
  const queue = items.entries();

  async function runWorker(): Promise<void> {
    for (const [index, item] of queue) {
      results[index] = await worker(item, index);
    }
  }

  await Promise.all(Array.from({ length: concurrency }, () => runWorker()));
  return results;
}

/** Fold per-text results into a `CorpusSummary`. A budget that is not a positive number is ignored. */
export function summarizeCorpusRun(results: readonly TextRunResult[], budgetMs?: number): CorpusSummary {
  const budget = budgetMs !== undefined && Number.isFinite(budgetMs) && budgetMs > 0 ? budgetMs : null;
  const summary: CorpusSummary = {
    texts: results.length,
    failedTexts: [],
    layerCounts: {},
    errorCodes: {},
    totalMs: 0,
    slowestIndex: null,
    overBudget: [],
    budgetMs: budget
  };

  let slowestMs = -1;
  for (const result of results) {
    for (const layer of result.layers) {
      summary.layerCounts[layer] = (summary.layerCounts[layer] ?? 0) + 1;
    }

    const errors = result.diagnostics.filter((diagnostic) => diagnostic.severity === 'error');
    if (errors.length > 0) {
      summary.failedTexts.push(result.index);
    }
    for (const error of errors) {
      summary.errorCodes[error.code] = (summary.errorCodes[error.code] ?? 0) + 1;
    }

    summary.totalMs += result.durationMs;
    if (result.durationMs > slowestMs) {
      slowestMs = result.durationMs;
      summary.slowestIndex = result.index;
    }
    if (budget !== null && result.durationMs > budget) {
      summary.overBudget.push(result.index);
    }
  }

  return summary;
}

/**
 * Run `taggers` in order over every text. A failing tagger stops the
 * remaining taggers for that text only and is recorded as an error
 * diagnostic; other texts are unaffected.
 */
export async function tagCorpus(
  texts: readonly Text[],
  taggers: readonly Tagger[],
  options: BatchOptions = {}
): Promise<CorpusRunResult> {
  const results = await runWithConcurrency(texts, options.concurrency ?? 1, async (text, index) =>
    tagOneText(text, taggers, index)
  );

  return {
    results,
    summary: summarizeCorpusRun(results, options.budgetMs)
  };
}

async function tagOneText(text: Text, taggers: readonly Tagger[], index: number): Promise<TextRunResult> {
  const started = performance.now();
  const layers: string[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const tagger of taggers) {
    try {
      layers.push(tagText(text, tagger).name);
    } catch (error) {
      diagnostics.push({
        code: error instanceof TextLayersError ? error.code : 'TAGGER_FAILED',
        severity: 'error',
        message: error instanceof Error ? error.message : String(error),
        layer: tagger.outputLayer
      });
      break;
    }
    // Yield between taggers so concurrent texts interleave.
    await Promise.resolve();
  }

  return { index, layers, durationMs: performance.now() - started, diagnostics };
}
