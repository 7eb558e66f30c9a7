import { Router } from 'express'
import { createTelegramRouter, EnqueueUpdate } from './telegram'

export interface RoutesDeps {
  enqueueUpdate: EnqueueUpdate
}

export const createRoutes = ({ enqueueUpdate }: RoutesDeps): Router => {
  const router = Router()

  router.get('/ping', (req, res) => {
    res.status(200).send('pong')
  })

  router.use('/telegram', createTelegramRouter(enqueueUpdate))

  router.use((req, res) => {
    res.status(404).json({ error: 'Not Found' })
  })

  return router
}
