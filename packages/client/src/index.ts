// Re-export types from validation package
export type {
  BenchmarkReport,
  BenchmarkSample,
  BenchmarkStats,
  ErrorInfo,
  FailureEnvelope,
  GatewayRequest,
  HealthCheckResult,
  HealthRecord,
  ResultEnvelope,
  SuccessEnvelope,
} from '@polystore/validation'
export { decodeBytes } from '@polystore/validation'
// Client
export type { PolystoreClient, PolystoreClientConfig } from './client.js'
export { createPolystoreClient, encodeRequest } from './client.js'
// Error deserialization
export { deserializeError } from './errors.js'
// Response guards
export { isBenchmarkReport, isErrorInfo, isHealthCheckResult, isResultEnvelope } from './guards.js'
