/**
 * Express application exposing the orchestrator over HTTP.
 */

import express from 'express'
import type { Express } from 'express'
import type { Orchestrator } from '../core/orchestrator.js'
import { apiError, errorHandler } from './middleware.js'
import { createLearningRoutes } from './routes/learning.js'
import { createWorkflowRoutes } from './routes/workflows.js'

export interface AppOptions {
  /** Reported by /health */
  version?: string
}

export function createApp(orchestrator: Orchestrator, options: AppOptions = {}): Express {
  const app = express()
  app.use(express.json({ limit: '1mb' }))

  app.get('/health', (_req, res) => {
    res.json({
      status: orchestrator.isReady ? 'ok' : 'starting',
      ...(options.version !== undefined && { version: options.version }),
    })
  })

  app.use('/api/v1/workflows', createWorkflowRoutes(orchestrator))
  app.use('/api/v1/learn', createLearningRoutes(orchestrator))

  app.use((req, res) => {
    res.status(404).json(apiError('NOT_FOUND', `No route for ${req.method} ${req.path}`))
  })
  app.use(errorHandler)

  return app
}
