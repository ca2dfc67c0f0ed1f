/**
 * Evaluation Dataset
 * Loads question/reference pairs and shapes them into chat-style examples
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { env } from '../../config/env';
import type { DatasetEntry, DatasetExample, EvalInputs } from './evaluation.types';

export const datasetEntrySchema = z.object({
  question: z.string().trim().min(1, 'question is required'),
  response: z.string(),
});

const datasetSchema = z.array(datasetEntrySchema).min(1, 'dataset is empty');

/**
 * Read and validate a dataset file, relative paths resolve from the working directory
 */
export function loadDataset(datasetPath: string = env.EVAL_DATASET_PATH): DatasetEntry[] {
  const resolved = path.resolve(process.cwd(), datasetPath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  const result = datasetSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors
      .map((err) => (err.path.length ? `${err.path.join('.')}: ${err.message}` : err.message))
      .join('; ');
    throw new Error(`Invalid dataset ${resolved}: ${errors}`);
  }

  return result.data;
}

export function toDatasetExample(entry: DatasetEntry): DatasetExample {
  return {
    inputs: { messages: [{ role: 'user', content: entry.question }] },
    outputs: { messages: [{ role: 'ai', content: entry.response }] },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined || value === null) {
    return '';
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/**
 * Pick the prompt out of example inputs:
 * the first message's content, else `question`, else the inputs themselves
 */
export function resolvePrompt(inputs: EvalInputs): string {
  if ('messages' in inputs) {
    const messages = inputs.messages;
    if (!Array.isArray(messages)) {
      return stringify(messages);
    }
    if (messages.length === 0) {
      return '';
    }
    const first: unknown = messages[0];
    return isRecord(first) ? stringify(first.content) : stringify(first);
  }

  if ('question' in inputs) {
    return stringify(inputs.question);
  }

  return JSON.stringify(inputs);
}
