export { createApp } from './app.js'
export type { AppOptions } from './app.js'
export { apiError, asyncRoute, errorHandler } from './middleware.js'
export type { ApiErrorBody } from './middleware.js'
