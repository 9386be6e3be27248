/**
 * @fileoverview Observability Module
 * @description Health checks, request logging and error reporting for the Express services
 */

// Health checks
export {
  healthCheck,
  deepHealthCheck,
  healthRouter,
  HealthStatus,
  DependencyStatus,
  DependencyCheck,
  ProbeResult,
  HealthRouterOptions,
} from './health-check';

// Error reporting
export { errorReportingMiddleware, describeError, ErrorBody } from './error-reporting';

// Middleware
export { requestLogger } from './middleware';
