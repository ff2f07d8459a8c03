/**
 * Node.js entry point for the estimator service
 */

import { serve } from '@hono/node-server'
import { createEstimatorApp, createExecutionContext, loadConfig, loadPricingTable } from './index'

const config = loadConfig(process.env)
const app = createEstimatorApp({ config, pricingTable: loadPricingTable(config) })
const ctx = createExecutionContext('[Estimator]')

console.log(`[Estimator] Will connect to takeoff service at ${config.takeoffServiceUrl}`)

const server = serve({ fetch: (request) => app.fetch(request, ctx), port: config.port }, (info) => {
  console.log(`[Estimator] Listening on http://localhost:${info.port}`)
})

async function shutdown(signal: string): Promise<void> {
  console.log(`[Estimator] ${signal} received, waiting for ${ctx.pending} background job(s)`)
  server.close()
  await ctx.drain()
  process.exit(0)
}

process.once('SIGINT', () => void shutdown('SIGINT'))
process.once('SIGTERM', () => void shutdown('SIGTERM'))
