/**
 * Chat Controller
 * HTTP request/response handling for extraction endpoints
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { chatService, type ChatService, type ExtractInput } from './chat.service';
import type { ExtractionResult } from './chat.types';

export interface IExtractResponse {
  success: boolean;
  runId: string;
  result: ExtractionResult;
}

const extractBodySchema = z.object({
  prompt: z.string({ required_error: 'Prompt is required' }).trim().min(1, 'Prompt is required'),
  headless: z.boolean().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

/**
 * Validate and normalize the POST /api/extract body
 */
export function parseExtractBody(body: unknown): ExtractInput {
  const result = extractBodySchema.safeParse(body);

  if (!result.success) {
    const errors = result.error.errors
      .map((err) => (err.path.length ? `${err.path.join('.')}: ${err.message}` : err.message))
      .join('; ');
    throw new ApiError(400, errors);
  }

  return result.data;
}

export class ChatController {
  constructor(private readonly service: ChatService = chatService) {}

  /**
   * POST /api/extract
   * Submit a prompt and wait for the captured answer
   */
  extract = asyncHandler(async (req: Request, res: Response) => {
    const input = parseExtractBody(req.body);
    const { runId, result } = await this.service.extract(input);

    const response: IExtractResponse = {
      success: result.kind === 'success',
      runId,
      result,
    };

    res.json(response);
  });

  /**
   * POST /api/extract/:runId/cancel
   * Cancel an in-flight or queued extraction
   */
  cancel = asyncHandler(async (req: Request, res: Response) => {
    const { runId } = req.params;

    if (!this.service.cancel(runId)) {
      throw new ApiError(404, 'Extraction run not found');
    }

    res.json({
      success: true,
      message: 'Cancellation requested',
      runId,
    });
  });

  /**
   * GET /api/extract/active
   * List in-flight run ids and limiter usage
   */
  getActive = asyncHandler(async (req: Request, res: Response) => {
    res.json({
      success: true,
      runIds: this.service.getActiveRunIds(),
      stats: this.service.getStats(),
    });
  });
}

export const chatController = new ChatController();
