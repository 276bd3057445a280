import { createConsoleLogger, validateGatewayConfig } from '@polystore/gateway'
import { createAdapterFactories } from './adapters.js'
import { loadGatewayConfig } from './config.js'
import { createServer } from './server.js'

const loaded = loadGatewayConfig(process.env)
const invalid = validateGatewayConfig(loaded.gateway)
if (invalid !== null) throw invalid

const logger = createConsoleLogger(loaded.server.logLevel)
for (const [paradigm, names] of Object.entries(loaded.missing)) {
  logger.warn('Store not configured', { paradigm, missing: names })
}

const server = await createServer({
  port: loaded.server.port,
  host: loaded.server.host,
  gatewayOptions: {
    adapters: createAdapterFactories(loaded),
    limits: loaded.gateway.limits,
    logger,
    eagerConnect: true,
  },
})

await server.start()
logger.info('polystore server listening', { url: server.url })

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down', { signal })
  await server.stop()
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) })
      process.exitCode = 1
    })
  })
}
