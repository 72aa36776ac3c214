import { Logger } from '@nestjs/common';
import { HealthCheckError } from '@nestjs/terminus';
import { createTestConfigService } from '../../../test/test-utils';
import { MetricsService } from '../metrics/metrics.service';
import { commerceDefinition } from '../../modules/simulation/definitions';
import { InstrumentRegistry } from '../../modules/simulation/instrument.registry';
import { MetricsRegistryIndicator } from './metrics-registry.indicator';

describe('MetricsRegistryIndicator', () => {
  let registry: InstrumentRegistry;
  let indicator: MetricsRegistryIndicator;

  beforeEach(() => {
    registry = new InstrumentRegistry(commerceDefinition, new MetricsService(createTestConfigService()));
    indicator = new MetricsRegistryIndicator(registry);
  });

  it('should report up with the instrument count once initialized', () => {
    registry.initialize();

    expect(indicator.isHealthy('metrics')).toEqual({ metrics: { status: 'up', instruments: 17 } });
  });

  it('should throw a HealthCheckError before initialization', () => {
    // Arrange
    const warn = jest.spyOn(Logger.prototype, 'warn');

    // Act
    let caught: unknown;
    try {
      indicator.isHealthy('metrics');
    } catch (error) {
      caught = error;
    }

    // Assert
    expect(caught).toBeInstanceOf(HealthCheckError);
    if (caught instanceof HealthCheckError) {
      expect(caught.message).toBe('Metrics registry not initialized');
      expect(caught.causes).toEqual({ metrics: { status: 'down', instruments: 0 } });
    }
    expect(warn).toHaveBeenCalledWith('Metrics registry health check failed: instruments not registered yet');
    warn.mockRestore();
  });
});
