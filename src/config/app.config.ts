import { registerAs } from '@nestjs/config';

/**
 * Application-level configuration using NestJS Config module
 *
 * One codebase serves the user, commerce and demo analytics services. The
 * analytics domain (ANALYTICS_DOMAIN) is read in main.ts before the module
 * graph exists; identity values live in the metrics namespace as common labels.
 *
 * @remarks
 * - Uses registerAs() to create a namespaced configuration object
 * - Port is left undefined when PORT is not set so the domain's default port applies
 */
export default registerAs('app', () => ({
  /** Server port for HTTP listener */
  port: process.env.PORT ? parseInt(process.env.PORT, 10) : undefined,

  /** Application environment - used for conditional logic throughout the app */
  environment: process.env.NODE_ENV || 'development',
}));
