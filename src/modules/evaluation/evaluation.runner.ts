/**
 * Evaluation Runner
 * Runs every dataset question through the extraction engine and grades the answers
 */

import { env } from '../../config/env';
import { mapWithConcurrency } from '../../lib/concurrency/concurrency.limiter';
import type { CorrectnessJudge, CorrectnessVerdict } from '../../lib/judge';
import { toError } from '../../lib/scraping/errors';
import { toEvalFormat } from '../chat/chat.response';
import type { EvalOutput, ExtractionRequest, ExtractionResult } from '../chat/chat.types';
import { resolvePrompt, toDatasetExample } from './evaluation.dataset';
import type {
  DatasetEntry,
  EvalInputs,
  EvaluationOptions,
  EvaluationSummary,
  ExampleResult,
  ExtractFn,
} from './evaluation.types';

export const defaultEvaluationOptions = (): EvaluationOptions => ({
  experimentPrefix: env.EVAL_EXPERIMENT_PREFIX,
  maxConcurrency: env.EVAL_MAX_CONCURRENCY,
  headless: true,
  timeoutMs: env.CHAT_TIMEOUT,
});

/**
 * Application under evaluation: one prompt in, one AI message out
 */
export async function runApp(
  inputs: EvalInputs,
  extract: ExtractFn,
  options: Pick<EvaluationOptions, 'headless' | 'timeoutMs'> = defaultEvaluationOptions()
): Promise<EvalOutput> {
  const result = await extract({
    prompt: resolvePrompt(inputs),
    headless: options.headless,
    timeoutMs: options.timeoutMs,
  });
  return toEvalFormat(result);
}

export class EvaluationRunner {
  private readonly options: EvaluationOptions;

  constructor(
    private readonly extract: ExtractFn,
    private readonly judge: CorrectnessJudge | null,
    options: Partial<EvaluationOptions> = {}
  ) {
    this.options = { ...defaultEvaluationOptions(), ...options };
  }

  async run(entries: readonly DatasetEntry[]): Promise<EvaluationSummary> {
    const judging = this.judge?.isAvailable() ? this.judge : null;
    if (!judging) {
      console.warn('⚠️  No judge configured, results will be unscored');
    }

    console.log(`📊 Running ${entries.length} example(s) for ${this.options.experimentPrefix} (concurrency ${this.options.maxConcurrency})`);

    const results = await mapWithConcurrency(entries, this.options.maxConcurrency, (entry, index) =>
      this.runExample(entry, index, judging)
    );

    return this.summarize(results);
  }

  private async runExample(
    entry: DatasetEntry,
    index: number,
    judge: CorrectnessJudge | null
  ): Promise<ExampleResult> {
    const example = toDatasetExample(entry);
    const referenceAnswer = example.outputs.messages[0]?.content ?? '';
    const startedAt = Date.now();

    // runApp is the graded target; the recorder keeps the raw result for the summary
    const runs: Array<{ request: ExtractionRequest; result: ExtractionResult }> = [];
    const output = await runApp(
      example.inputs,
      async (request) => {
        const result = await this.extract(request);
        runs.push({ request, result });
        return result;
      },
      this.options
    );
    const run = runs[0];
    if (!run) {
      throw new Error(`Example ${index}: runApp returned without extracting`);
    }
    const { prompt } = run.request;
    const { result } = run;
    const answer = output.messages[0]?.content ?? '';

    let verdict: CorrectnessVerdict | null = null;
    let judgeError: string | undefined;
    if (judge) {
      try {
        verdict = await judge.evaluate({ inputs: prompt, outputs: answer, referenceOutputs: referenceAnswer });
      } catch (error) {
        judgeError = toError(error).message;
        console.error(`Example ${index}: ${judge.name} judge failed: ${judgeError}`);
      }
    }

    const exampleResult: ExampleResult = {
      index,
      prompt,
      referenceAnswer,
      answer,
      kind: result.kind,
      verdict,
      durationMs: Date.now() - startedAt,
    };

    switch (result.kind) {
      case 'success':
        console.log(`✅ Example ${index}: captured ${answer.length} chars via ${result.metadata.content_source}`);
        break;
      case 'failure':
        exampleResult.errorType = result.metadata.error_type;
        console.log(`❌ Example ${index}: ${result.metadata.error_type}: ${result.metadata.error}`);
        break;
      default: {
        const exhaustive: never = result;
        throw new Error(`Unhandled result: ${JSON.stringify(exhaustive)}`);
      }
    }

    if (judgeError !== undefined) {
      exampleResult.judgeError = judgeError;
    }

    return exampleResult;
  }

  private summarize(results: ExampleResult[]): EvaluationSummary {
    const succeeded = results.filter((r) => r.kind === 'success').length;
    const scoredVerdicts = results.flatMap((r) => (r.verdict ? [r.verdict] : []));
    const correct = scoredVerdicts.filter((v) => v.score).length;

    return {
      experimentPrefix: this.options.experimentPrefix,
      total: results.length,
      succeeded,
      failed: results.length - succeeded,
      scored: scoredVerdicts.length,
      averageScore: scoredVerdicts.length > 0 ? correct / scoredVerdicts.length : null,
      results,
    };
  }
}
