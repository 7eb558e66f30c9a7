import express, { Express } from 'express'
import morgan from 'morgan'
import { createRoutes, RoutesDeps } from './routes'

export const createApp = (deps: RoutesDeps): Express => {
  const app = express()

  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan(':method :url :status :remote-addr :response-time ms :date[iso]'))
  }
  app.use(express.json({ limit: '1mb' }))
  app.use(createRoutes(deps))

  return app
}
