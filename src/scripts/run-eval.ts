/**
 * Run the evaluation dataset against the live chat application
 *
 *   npm run eval
 */

import { env } from '../config/env';
import { OpenAIJudge } from '../lib/judge';
import { ConcurrencyLimiter } from '../lib/concurrency/concurrency.limiter';
import { ExtractionEngine } from '../modules/chat/engine';
import { loadDataset } from '../modules/evaluation/evaluation.dataset';
import { EvaluationRunner } from '../modules/evaluation/evaluation.runner';

async function main(): Promise<void> {
  console.log('Setting up evaluation...');
  const entries = loadDataset();
  console.log(`Loaded ${entries.length} example(s) from ${env.EVAL_DATASET_PATH}`);

  const engine = new ExtractionEngine();
  const limiter = new ConcurrencyLimiter(env.MAX_CONCURRENT_EXTRACTIONS);
  const runner = new EvaluationRunner(
    (request) => limiter.run(() => engine.extract(request)),
    new OpenAIJudge()
  );

  console.log('Running evaluation...');
  console.log('This may take a while as every question drives a real browser session...');
  const summary = await runner.run(entries);

  console.log('\n' + '='.repeat(50));
  console.log('Evaluation Complete!');
  console.log('='.repeat(50));
  console.log(`Experiment: ${summary.experimentPrefix}`);
  console.log(`Captured: ${summary.succeeded}/${summary.total} (failed: ${summary.failed})`);
  console.log(
    summary.averageScore === null
      ? 'Correctness: not scored (set OPENAI_API_KEY to enable the judge)'
      : `Correctness: ${(summary.averageScore * 100).toFixed(1)}% of ${summary.scored} scored`
  );

  for (const result of summary.results) {
    const grade = result.verdict ? (result.verdict.score ? 'correct' : 'incorrect') : 'unscored';
    console.log(`\n[${result.index}] ${result.prompt} (${result.kind}, ${grade}, ${result.durationMs}ms)`);
    console.log(result.answer);
    if (result.verdict) {
      console.log(`Judge: ${result.verdict.reasoning}`);
    }
  }
}

main().catch((error: unknown) => {
  console.error('Evaluation failed:', error);
  process.exit(1);
});
