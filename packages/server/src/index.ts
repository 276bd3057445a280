export type { AdapterWiring } from './adapters.js'
export { createAdapterFactories } from './adapters.js'
export type { Env, LoadedConfig, ServerSettings } from './config.js'
export { loadGatewayConfig } from './config.js'
export type {
  AddProductResult,
  EcommerceScenario,
  ProductInput,
  SalesAnalytics,
  SimilarProduct,
} from './scenarios.js'
export { createEcommerceScenario, parseProduct, parseSimilarQuery, toSimilarProducts } from './scenarios.js'
export type { PolystoreServer, ServerConfig } from './server.js'
export { createServer, toGatewayRequest, toWireEnvelope } from './server.js'
