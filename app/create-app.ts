/**
 * @fileoverview Express application
 *
 * Routes are mounted at the root. The Inngest serve handler and the built
 * browser UI are optional so tests can build the app without either.
 *
 * @module app/create-app
 */

import express, { type ErrorRequestHandler, type Express, type RequestHandler } from "express"
import { error } from "@/lib/api-utils"
import { BadRequestError, NotFoundError, toAppError } from "@/lib/errors"
import {
  complianceRouter,
  healthRouter,
  monitorRouter,
  regulationsRouter,
  reportsRouter,
} from "./routes"

export interface CreateAppOptions {
  /** Mounted at /api/inngest */
  inngestHandler?: RequestHandler
  /** Directory of the built UI, served at /app */
  webDir?: string
}

export function createApp(options: CreateAppOptions = {}): Express {
  const app = express()

  app.disable("x-powered-by")
  // Inngest payloads carry extracted regulation text
  app.use(express.json({ limit: "10mb" }))

  if (options.inngestHandler) {
    app.use("/api/inngest", options.inngestHandler)
  }

  app.use(healthRouter)
  app.use(regulationsRouter)
  app.use(complianceRouter)
  app.use(reportsRouter)
  app.use(monitorRouter)

  if (options.webDir) {
    app.use("/app", express.static(options.webDir))
  }

  app.use((req, res) => {
    error(res, new NotFoundError(`Route not found: ${req.method} ${req.path}`))
  })

  // Malformed JSON bodies and anything thrown outside createHandler
  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    error(res, err instanceof SyntaxError ? new BadRequestError("Invalid JSON body") : toAppError(err))
  }
  app.use(errorHandler)

  return app
}
