/**
 * OpenAI Correctness Judge
 * Grades a captured answer against the reference answer with a chat completion
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { z } from 'zod';
import { env } from '../../config/env';
import { toError } from '../scraping/errors';
import { CORRECTNESS_SYSTEM_PROMPT, buildCorrectnessPrompt } from './correctness.prompt';
import type { CorrectnessInput, CorrectnessJudge, CorrectnessVerdict } from './judge.types';

/**
 * Sends the messages and returns the raw completion text
 */
export type CompletionFn = (messages: ChatCompletionMessageParam[]) => Promise<string | null>;

export interface OpenAIJudgeOptions {
  apiKey?: string;
  model?: string;
  complete?: CompletionFn;
}

const verdictSchema = z.object({
  reasoning: z.string().default(''),
  score: z.union([
    z.boolean(),
    z.enum(['true', 'false']).transform((value) => value === 'true'),
  ]),
});

/**
 * Parse the judge's JSON reply into a verdict
 */
export function parseVerdict(text: string): CorrectnessVerdict {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Judge returned invalid JSON: ${toError(error).message}`);
  }

  const result = verdictSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ');
    throw new Error(`Judge returned an unexpected verdict: ${errors}`);
  }

  return {
    key: 'correctness',
    score: result.data.score,
    reasoning: result.data.reasoning,
  };
}

export class OpenAIJudge implements CorrectnessJudge {
  readonly name = 'OpenAI';
  private readonly model: string;
  private readonly complete: CompletionFn | null;

  constructor(options: OpenAIJudgeOptions = {}) {
    this.model = options.model ?? env.OPENAI_MODEL;
    this.complete = options.complete ?? this.createCompletion(options.apiKey ?? env.OPENAI_API_KEY);
  }

  isAvailable(): boolean {
    return this.complete !== null;
  }

  async evaluate(input: CorrectnessInput): Promise<CorrectnessVerdict> {
    if (!this.complete) {
      throw new Error('OpenAI judge is not configured. Set OPENAI_API_KEY.');
    }

    const text = await this.complete([
      { role: 'system', content: CORRECTNESS_SYSTEM_PROMPT },
      { role: 'user', content: buildCorrectnessPrompt(input) },
    ]);

    if (!text) {
      throw new Error('Empty response from OpenAI');
    }

    return parseVerdict(text);
  }

  private createCompletion(apiKey: string | undefined): CompletionFn | null {
    if (!apiKey) {
      return null;
    }

    const client = new OpenAI({ apiKey });
    const model = this.model;

    return async (messages) => {
      try {
        const response = await client.chat.completions.create({
          model,
          messages,
          response_format: { type: 'json_object' },
          temperature: 0,
          max_tokens: 500,
        });
        return response.choices[0]?.message?.content ?? null;
      } catch (error) {
        if (error instanceof OpenAI.APIError) {
          if (error.status === 429) {
            throw new Error('OpenAI rate limit exceeded. Please try again later.');
          }
          if (error.status === 401) {
            throw new Error('OpenAI API key is invalid');
          }
        }
        throw new Error(`OpenAI API error: ${toError(error).message}`);
      }
    };
  }
}
