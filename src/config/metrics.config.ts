import { registerAs } from '@nestjs/config';

/**
 * Metrics and simulation configuration
 *
 * Controls the background simulation scheduler and the prom-client registry.
 * The scheduler is enabled unless METRICS_SIMULATION_ENABLED is exactly "false".
 */
export default registerAs('metrics', () => ({
  /** Master switch for every background simulation job */
  simulationEnabled: process.env.METRICS_SIMULATION_ENABLED !== 'false',

  /** Period of the demo domain's user activity job */
  simulationIntervalSeconds: parseInt(process.env.METRICS_SIMULATION_INTERVAL_SECONDS || '5', 10),

  /** Node.js runtime metrics (heap, event loop lag, GC) next to the simulated ones */
  collectDefaultMetrics: process.env.METRICS_COLLECT_DEFAULT !== 'false',

  /** Labels applied to every series; the application label is added per domain */
  commonLabels: {
    environment: process.env.NODE_ENV || 'development',
    version: process.env.APP_VERSION || '1.0.0',
    instance: process.env.APP_INSTANCE || 'local',
  },
}));
