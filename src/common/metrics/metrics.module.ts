import { Global, Module } from '@nestjs/common';
import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';

/**
 * Metrics module for application monitoring and observability
 * Provides the prom-client registry shared by the simulation engine,
 * the HTTP interceptor and the exposition endpoint
 */
@Global()
@Module({
  controllers: [MetricsController], // Exposes /actuator/prometheus for Prometheus scraping
  providers: [MetricsService],
  exports: [MetricsService],
})
export class MetricsModule {}
