/**
 * Evaluation Controller
 * HTTP handling for dataset evaluation runs
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import { OpenAIJudge, type CorrectnessJudge } from '../../lib/judge';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { chatService, type ChatService } from '../chat/chat.service';
import { datasetEntrySchema, loadDataset } from './evaluation.dataset';
import { EvaluationRunner } from './evaluation.runner';
import type { DatasetEntry, EvaluationOptions } from './evaluation.types';

const evaluationBodySchema = z.object({
  examples: z.array(datasetEntrySchema).min(1, 'examples must not be empty').optional(),
  maxConcurrency: z.number().int().min(1).max(10).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export interface EvaluationRequest {
  examples?: DatasetEntry[];
  options: Partial<EvaluationOptions>;
}

export function parseEvaluationBody(body: unknown): EvaluationRequest {
  const result = evaluationBodySchema.safeParse(body ?? {});

  if (!result.success) {
    const errors = result.error.errors
      .map((err) => (err.path.length ? `${err.path.join('.')}: ${err.message}` : err.message))
      .join('; ');
    throw new ApiError(400, errors);
  }

  const { examples, maxConcurrency, timeoutMs } = result.data;
  const options: Partial<EvaluationOptions> = {};
  if (maxConcurrency !== undefined) {
    options.maxConcurrency = maxConcurrency;
  }
  if (timeoutMs !== undefined) {
    options.timeoutMs = timeoutMs;
  }

  return { examples, options };
}

export class EvaluationController {
  constructor(
    private readonly service: ChatService = chatService,
    private readonly judge: CorrectnessJudge = new OpenAIJudge(),
    private readonly dataset: () => DatasetEntry[] = () => loadDataset()
  ) {}

  /**
   * POST /api/evaluations
   * Run the dataset (or the posted examples) and return the graded summary
   */
  run = asyncHandler(async (req: Request, res: Response) => {
    const { examples, options } = parseEvaluationBody(req.body);

    // Every extraction goes through the service so HTTP and evaluation share one concurrency cap
    const runner = new EvaluationRunner(
      async (request) => (await this.service.extract(request)).result,
      this.judge,
      options
    );
    const summary = await runner.run(examples ?? this.dataset());

    res.json({
      success: true,
      summary,
    });
  });
}

export const evaluationController = new EvaluationController();
