/**
 * Evaluation Runner Tests
 */

import { EvaluationRunner, runApp } from '../evaluation.runner';
import { toDatasetExample } from '../evaluation.dataset';
import { createFailureResult, createSuccessResult } from '../../chat/chat.response';
import type { ExtractionRequest, ExtractionResult } from '../../chat/chat.types';
import { LocatorTimeoutError } from '../../../lib/scraping/errors';
import type { CorrectnessInput, CorrectnessJudge, CorrectnessVerdict } from '../../../lib/judge';
import { testDatasetEntries } from '../../../__tests__/helpers/fixtures';

function answer(request: ExtractionRequest, text: string): ExtractionResult {
  return createSuccessResult({
    request,
    text,
    url: 'https://chat.langchain.com',
    contentSource: 'clipboard',
    rawMarkup: null,
    rawMarkupStatus: 'not_found',
    messageCount: 1,
    networkIdle: true,
  });
}

class FakeJudge implements CorrectnessJudge {
  readonly name = 'Fake';
  readonly inputs: CorrectnessInput[] = [];

  constructor(private readonly available = true, private readonly failOn?: string) {}

  isAvailable(): boolean {
    return this.available;
  }

  async evaluate(input: CorrectnessInput): Promise<CorrectnessVerdict> {
    this.inputs.push(input);
    if (input.inputs === this.failOn) {
      throw new Error('judge offline');
    }
    return {
      key: 'correctness',
      score: !input.outputs.startsWith('Error scraping'),
      reasoning: 'compared with reference',
    };
  }
}

describe('runApp', () => {
  it('should resolve the prompt and return one AI message', async () => {
    const extract = jest.fn(async (request: ExtractionRequest) => answer(request, 'LangChain is a framework.'));

    const output = await runApp(
      { messages: [{ role: 'user', content: 'What is LangChain?' }] },
      extract,
      { headless: true, timeoutMs: 30000 }
    );

    expect(extract).toHaveBeenCalledWith({ prompt: 'What is LangChain?', headless: true, timeoutMs: 30000 });
    expect(output).toEqual({ messages: [{ role: 'ai', content: 'LangChain is a framework.' }] });
  });

  it('should return failure text as the AI message', async () => {
    const output = await runApp(
      { question: 'What is LangChain?' },
      async (request) => createFailureResult(new LocatorTimeoutError('Copy control did not appear within 30000ms'), request),
      { headless: true, timeoutMs: 30000 }
    );

    expect(output.messages[0].content).toBe(
      'Error scraping chat.langchain.com: Copy control did not appear within 30000ms'
    );
  });
});

describe('EvaluationRunner', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should extract, grade and summarize every example', async () => {
    const judge = new FakeJudge();
    const runner = new EvaluationRunner(
      async (request) => request.prompt === 'What is LangGraph?'
        ? createFailureResult(new LocatorTimeoutError('Copy control did not appear within 30000ms'), request)
        : answer(request, 'LangChain is a framework for LLM apps.'),
      judge,
      { experimentPrefix: 'test-run', maxConcurrency: 2, headless: true, timeoutMs: 30000 }
    );

    const summary = await runner.run(testDatasetEntries);

    expect(summary).toMatchObject({
      experimentPrefix: 'test-run',
      total: 2,
      succeeded: 1,
      failed: 1,
      scored: 2,
      averageScore: 0.5,
    });
    expect(summary.results[0]).toMatchObject({
      index: 0,
      prompt: 'What is LangChain?',
      referenceAnswer: 'LangChain is a framework for building applications with LLMs.',
      answer: 'LangChain is a framework for LLM apps.',
      kind: 'success',
      verdict: { key: 'correctness', score: true, reasoning: 'compared with reference' },
    });
    expect(summary.results[1].errorType).toBe('LocatorTimeoutError');
    expect(judge.inputs[0]).toEqual({
      inputs: 'What is LangChain?',
      outputs: 'LangChain is a framework for LLM apps.',
      referenceOutputs: 'LangChain is a framework for building applications with LLMs.',
    });
  });

  it('should grade the AI message that runApp produces', async () => {
    const judge = new FakeJudge();
    const extract = jest.fn(async (request: ExtractionRequest) => request.prompt === 'What is LangGraph?'
      ? createFailureResult(new LocatorTimeoutError('Copy control did not appear within 5000ms'), request)
      : answer(request, 'LangChain is a framework for LLM apps.'));
    const runner = new EvaluationRunner(extract, judge, {
      maxConcurrency: 1,
      headless: false,
      timeoutMs: 5000,
    });

    const summary = await runner.run(testDatasetEntries);
    const expected = await runApp(toDatasetExample(testDatasetEntries[1]).inputs, extract, { headless: false, timeoutMs: 5000 });

    expect(extract).toHaveBeenCalledWith({ prompt: 'What is LangChain?', headless: false, timeoutMs: 5000 });
    expect(judge.inputs[1].outputs).toBe(expected.messages[0].content);
    expect(judge.inputs[1].outputs).toBe(
      'Error scraping chat.langchain.com: Copy control did not appear within 5000ms'
    );
    expect(summary.results[1]).toMatchObject({
      prompt: 'What is LangGraph?',
      answer: expected.messages[0].content,
      kind: 'failure',
      errorType: 'LocatorTimeoutError',
    });
  });

  it('should leave results unscored without an available judge', async () => {
    const judge = new FakeJudge(false);
    const runner = new EvaluationRunner(
      async (request) => answer(request, 'An answer.'),
      judge,
      { maxConcurrency: 1 }
    );

    const summary = await runner.run(testDatasetEntries);

    expect(summary.scored).toBe(0);
    expect(summary.averageScore).toBeNull();
    expect(summary.results.every((r) => r.verdict === null)).toBe(true);
    expect(judge.inputs).toHaveLength(0);
  });

  it('should record judge errors per example', async () => {
    const runner = new EvaluationRunner(
      async (request) => answer(request, 'An answer.'),
      new FakeJudge(true, 'What is LangGraph?'),
      { maxConcurrency: 2 }
    );

    const summary = await runner.run(testDatasetEntries);

    expect(summary.results[1].verdict).toBeNull();
    expect(summary.results[1].judgeError).toBe('judge offline');
    expect(summary.results[0].judgeError).toBeUndefined();
    expect(summary.scored).toBe(1);
    expect(summary.averageScore).toBe(1);
  });

  it('should bound concurrent extractions', async () => {
    let inFlight = 0;
    let peak = 0;
    const runner = new EvaluationRunner(
      async (request) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return answer(request, 'An answer.');
      },
      null,
      { maxConcurrency: 2 }
    );

    const entries = [...testDatasetEntries, ...testDatasetEntries, ...testDatasetEntries];
    const summary = await runner.run(entries);

    expect(summary.total).toBe(6);
    expect(peak).toBe(2);
  });
});
