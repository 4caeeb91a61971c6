/**
 * /api/chat: one user message in, one TurnResponse out
 */
import express, { Request, Response, NextFunction } from 'express';
import {
  chatRequestSchema,
  historyIndexParamsSchema,
  sessionParamsSchema,
  validateRequest,
} from '@/agent/agent.validation';
import type { Orchestrator } from '@/services/orchestrator';
import { logger } from '@/services/logger';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { correlationIdOf } from '@/middleware/correlation';

export function createChatRouter(orchestrator: Orchestrator): express.Router {
  const router = express.Router();

  /**
   * POST /api/chat
   * Body: { sessionId, message, userId? }
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateRequest(chatRequestSchema, req.body);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid request body', validation.error));
      return;
    }

    const { sessionId, message, userId } = validation.data;
    logger.debug('http:chat', { sessionId, correlationId: correlationIdOf(res) });

    try {
      const turn = await orchestrator.handleTurn(sessionId, message, { userId });
      res.status(200).json(createSuccessResponse(turn));
    } catch (err) {
      next(err);
    }
  });

  /**
   * DELETE /api/chat/:sessionId
   * Ends the conversation and drops its memory.
   */
  router.delete('/:sessionId', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateRequest(sessionParamsSchema, req.params);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid session id', validation.error));
      return;
    }

    try {
      const ended = await orchestrator.endSession(validation.data.sessionId);
      if (!ended) {
        res.status(404).json(createErrorResponse('Session not found'));
        return;
      }
      res.status(200).json(createSuccessResponse({ sessionId: validation.data.sessionId, ended: true }));
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/chat/:sessionId/history
   * Past recommendation cycles, oldest first.
   */
  router.get('/:sessionId/history', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateRequest(sessionParamsSchema, req.params);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid session id', validation.error));
      return;
    }

    try {
      const history = await orchestrator.searchHistory(validation.data.sessionId);
      if (!history) {
        res.status(404).json(createErrorResponse('Session not found'));
        return;
      }
      res.status(200).json(createSuccessResponse(history));
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/chat/:sessionId/history/:index
   */
  router.get('/:sessionId/history/:index', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateRequest(historyIndexParamsSchema, req.params);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid history index', validation.error));
      return;
    }

    try {
      const { sessionId, index } = validation.data;
      const cycle = await orchestrator.searchAt(sessionId, index);
      if (!cycle) {
        res.status(404).json(createErrorResponse('Search not found'));
        return;
      }
      res.status(200).json(createSuccessResponse(cycle));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
