import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { HealthCheckService, HealthCheck, MemoryHealthIndicator } from '@nestjs/terminus';
import { MetricsRegistryIndicator } from './metrics-registry.indicator';

/** Heap ceiling for the aggregate check */
const HEAP_LIMIT_BYTES = 300 * 1024 * 1024;

/**
 * Actuator-style health endpoints
 * Aggregate health plus Kubernetes-style liveness and readiness probes,
 * using @nestjs/terminus for standardized health check responses
 */
@ApiTags('Health')
@Controller('actuator/health')
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private memory: MemoryHealthIndicator,
    private metricsRegistry: MetricsRegistryIndicator,
  ) {}

  /**
   * Aggregate health check
   * Heap usage and metric registry readiness; 503 when either fails
   */
  @Get()
  @ApiOperation({ summary: 'Aggregate health check' })
  @ApiResponse({ status: 200, description: 'Service is healthy' })
  @ApiResponse({ status: 503, description: 'Service is unhealthy' })
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.metricsRegistry.isHealthy('metrics'),
    ]);
  }

  /**
   * Kubernetes liveness probe
   * Uses a higher memory threshold than the aggregate check
   */
  @Get('liveness')
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiResponse({ status: 200, description: 'Service is alive' })
  @ApiResponse({ status: 503, description: 'Service is not alive' })
  @HealthCheck()
  liveness() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', 2 * HEAP_LIMIT_BYTES), // Higher threshold for liveness
    ]);
  }

  /**
   * Kubernetes readiness probe
   * Ready once every instrument is registered and scrapeable
   */
  @Get('readiness')
  @ApiOperation({ summary: 'Readiness probe' })
  @ApiResponse({ status: 200, description: 'Service is ready' })
  @ApiResponse({ status: 503, description: 'Service is not ready' })
  @HealthCheck()
  readiness() {
    return this.health.check([() => this.metricsRegistry.isHealthy('metrics')]);
  }
}
