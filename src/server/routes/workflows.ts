/**
 * Workflow routes.
 *
 * POST /api/v1/workflows             - start a workflow (returns once committed)
 * GET  /api/v1/workflows/:ref        - workflow status and progress events
 * POST /api/v1/workflows/:ref/cancel - abort the background task
 */

import { Router } from 'express'
import type { Orchestrator } from '../../core/orchestrator.js'
import { parseWorkflowRequest } from '../../core/workflow-request.js'
import { apiError, asyncRoute } from '../middleware.js'

export function createWorkflowRoutes(orchestrator: Orchestrator): Router {
  const router = Router()

  router.post(
    '/',
    asyncRoute(async (req, res) => {
      const request = parseWorkflowRequest(req.body)
      const started = await orchestrator.startWorkflow(request)
      res.status(202).json(started)
    }),
  )

  router.get('/:ref', (req, res) => {
    res.json(orchestrator.getWorkflowStatus(req.params.ref))
  })

  router.post('/:ref/cancel', (req, res) => {
    const status = orchestrator.getWorkflowStatus(req.params.ref)
    if (!orchestrator.cancelWorkflow(status.executionRef)) {
      res.status(409).json(apiError('NOT_CANCELABLE', `Workflow ${status.executionRef} is not running`))
      return
    }
    res.status(202).json({ executionRef: status.executionRef, canceled: true })
  })

  return router
}
