/**
 * Chat Router
 * Route definitions for extraction endpoints
 */

import { Router } from 'express';
import { chatController } from './chat.controller';

const router = Router();

/**
 * @route   POST /api/extract
 * @desc    Submit a prompt and capture the answer
 * @access  Public
 */
router.post('/', chatController.extract);

/**
 * @route   GET /api/extract/active
 * @desc    List in-flight extraction runs
 * @access  Public
 */
router.get('/active', chatController.getActive);

/**
 * @route   POST /api/extract/:runId/cancel
 * @desc    Cancel an extraction run
 * @access  Public
 */
router.post('/:runId/cancel', chatController.cancel);

export default router;
