/**
 * Evaluation Router
 */

import { Router } from 'express';
import { evaluationController } from './evaluation.controller';

const router = Router();

/**
 * @route   POST /api/evaluations
 * @desc    Run the evaluation dataset against the chat application
 * @access  Public
 */
router.post('/', evaluationController.run);

export default router;
