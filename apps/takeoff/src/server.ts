/**
 * Node.js entry point for the takeoff service
 */

import { serve } from '@hono/node-server'
import { createTakeoffApp, loadConfig } from './index'

const config = loadConfig(process.env)
const app = createTakeoffApp({ config })

const server = serve({ fetch: (request) => app.fetch(request), port: config.port }, (info) => {
  console.log(`[Takeoff] Listening on http://localhost:${info.port}`)
  console.log(`[Takeoff] Change notifications go to ${config.estimatorWebhookUrl}`)
})

function shutdown(signal: string): void {
  console.log(`[Takeoff] ${signal} received, shutting down`)
  server.close()
}

process.once('SIGINT', () => shutdown('SIGINT'))
process.once('SIGTERM', () => shutdown('SIGTERM'))
