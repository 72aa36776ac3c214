import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { MetricsRegistryIndicator } from './metrics-registry.indicator';

/**
 * Health monitoring module for the application
 * Serves /actuator/health with liveness and readiness probes
 *
 * Features:
 * - Heap usage checks
 * - Metric registry readiness (instruments registered for the active domain)
 */
@Module({
  imports: [
    TerminusModule, // Core health check functionality
  ],
  controllers: [HealthController], // Health check endpoints
  providers: [
    MetricsRegistryIndicator, // Requires InstrumentRegistry from the global SimulationModule
  ],
})
export class HealthModule {}
