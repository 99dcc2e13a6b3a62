/**
 * POST /api/v1/learn/record - callback of a generated pipeline's learning job.
 */

import { Router } from 'express'
import type { Orchestrator } from '../../core/orchestrator.js'
import { parseLearningCallback } from '../../core/workflow-request.js'
import { asyncRoute } from '../middleware.js'

export function createLearningRoutes(orchestrator: Orchestrator): Router {
  const router = Router()

  router.post(
    '/record',
    asyncRoute(async (req, res) => {
      const callback = parseLearningCallback(req.body)
      const result = await orchestrator.recordLearning(callback)
      // pending: the background task stores the config once the execution id is known
      res.status(result.status === 'pending' ? 202 : 200).json(result)
    }),
  )

  return router
}
