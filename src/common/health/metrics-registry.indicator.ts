import { Injectable, Logger } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { InstrumentRegistry } from '../../modules/simulation/instrument.registry';

/**
 * Health indicator reporting whether the domain's instruments are registered
 * Extends Terminus HealthIndicator for standardized health check responses
 */
@Injectable()
export class MetricsRegistryIndicator extends HealthIndicator {
  private readonly logger = new Logger(MetricsRegistryIndicator.name);

  constructor(private readonly instruments: InstrumentRegistry) {
    super();
  }

  /**
   * @param key - Name of the check in the health response
   * @throws HealthCheckError while the registry is not initialized
   */
  isHealthy(key: string): HealthIndicatorResult {
    const instrumentCount = this.instruments.instrumentNames().length;

    if (this.instruments.isInitialized) {
      return this.getStatus(key, true, { instruments: instrumentCount });
    }

    this.logger.warn('Metrics registry health check failed: instruments not registered yet');
    throw new HealthCheckError(
      'Metrics registry not initialized',
      this.getStatus(key, false, { instruments: 0 }),
    );
  }
}
