import { MetricsService } from '../../common/metrics/metrics.service';
import { createSimulationHarness, createTestConfigService, seriesValue } from '../../../test/test-utils';
import {
  ActivityStep,
  DomainDefinition,
  InstrumentKind,
  commerceDefinition,
  demoDefinition,
  userDefinition,
} from './definitions';
import { GaugeCell, InstrumentRegistry, labelCombinations } from './instrument.registry';

const PROMETHEUS_TYPES: Record<InstrumentKind, string> = {
  counter: 'counter',
  gauge: 'gauge',
  timer: 'histogram',
  summary: 'summary',
};

const COMMON_LABELS = 'environment="test",version="1.0.0",instance="test-instance"';

function minimalDefinition(
  activities: Record<string, ActivityStep[]>,
  regionValues: string[] = ['r1'],
): DomainDefinition {
  return {
    service: 'test-service',
    defaultPort: 9000,
    instruments: [
      { kind: 'counter', name: 'test_region_total', help: 'Region', labels: { region: ['r1'] } },
      { kind: 'timer', name: 'test_endpoint_seconds', help: 'Endpoint', labels: { endpoint: ['/e'] } },
      { kind: 'gauge', name: 'test_level', help: 'Level', initial: 0, min: 0, max: 10 },
      { kind: 'summary', name: 'test_value', help: 'Value' },
    ],
    regions: { counter: 'test_region_total', values: regionValues },
    endpoints: { timer: 'test_endpoint_seconds', values: ['/e'] },
    activities,
    schedule: {
      jobs: [],
      sweepPeriodMs: 60_000,
      burst: {
        periodMs: 1_000,
        repetitions: { min: 1, max: 1 },
        pauseMs: { min: 1, max: 1 },
        split: [],
        fallback: 'main',
      },
    },
    healthActivity: 'main',
    commands: {},
  };
}

describe('InstrumentRegistry', () => {
  describe.each([
    ['commerce', commerceDefinition],
    ['user', userDefinition],
    ['demo', demoDefinition],
  ])('%s domain', (_domain, definition) => {
    it('should list every instrument in the exposition before any mutation', async () => {
      // Arrange
      const { metrics } = createSimulationHarness(definition);

      // Act
      const exposition = await metrics.getMetrics();

      // Assert
      for (const instrument of definition.instruments) {
        expect(exposition).toContain(`# TYPE ${instrument.name} ${PROMETHEUS_TYPES[instrument.kind]}\n`);
      }
    });

    it('should pre-populate a zero series for every region', async () => {
      const { metrics } = createSimulationHarness(definition);

      const exposition = await metrics.getMetrics();

      for (const region of definition.regions.values) {
        expect(exposition).toContain(
          `${definition.regions.counter}{region="${region}",${COMMON_LABELS},application="${definition.service}"} 0\n`,
        );
      }
    });

    it('should pre-populate a zero timer for every endpoint', async () => {
      const { metrics } = createSimulationHarness(definition);

      const exposition = await metrics.getMetrics();

      for (const endpoint of definition.endpoints.values) {
        expect(exposition).toContain(
          `${definition.endpoints.timer}_count{endpoint="${endpoint}",${COMMON_LABELS},application="${definition.service}"} 0\n`,
        );
      }
    });

    it('should register the full cross-product of every labelled counter', async () => {
      const { metrics } = createSimulationHarness(definition);

      for (const instrument of definition.instruments) {
        if (instrument.kind !== 'counter' || !instrument.labels) {
          continue;
        }
        const expected = Object.values(instrument.labels).reduce((product, values) => product * values.length, 1);
        const metric = metrics.getRegistry().getSingleMetric(instrument.name);
        const data = metric ? await metric.get() : undefined;
        expect(data?.values.length).toBe(expected);
      }
    });

    it('should start every gauge at its initial value', () => {
      const { registry } = createSimulationHarness(definition);

      for (const instrument of definition.instruments) {
        if (instrument.kind === 'gauge') {
          expect(registry.gauge(instrument.name).value).toBe(instrument.initial);
        }
      }
    });
  });

  it('should register 140 order series for commerce', async () => {
    const { metrics } = createSimulationHarness(commerceDefinition);

    const metric = metrics.getRegistry().getSingleMetric('commerce_orders_total');
    const data = metric ? await metric.get() : undefined;

    expect(data?.values.length).toBe(5 * 7 * 4);
  });

  it('should expose initial gauge values', async () => {
    const { metrics } = createSimulationHarness(commerceDefinition);

    expect(await seriesValue(metrics, 'commerce_inventory_levels')).toBe(1000);
    expect(await seriesValue(metrics, 'commerce_database_connections_active')).toBe(10);
    expect(await seriesValue(metrics, 'commerce_orders_active')).toBe(0);
  });

  describe('initialize', () => {
    it('should be safe to call again', () => {
      const { registry } = createSimulationHarness(userDefinition);

      expect(() => registry.initialize()).not.toThrow();
      expect(registry.isInitialized).toBe(true);
    });

    it('should fetch existing instruments when another registry initializes over the same metrics', () => {
      // Arrange
      const metrics = new MetricsService(createTestConfigService());
      const first = new InstrumentRegistry(demoDefinition, metrics);
      const second = new InstrumentRegistry(demoDefinition, metrics);
      first.initialize();

      // Act
      second.initialize();

      // Assert
      expect(second.counter('app_requests_total').metric).toBe(first.counter('app_requests_total').metric);
    });

    it('should reject an accumulate step without a stored draw', () => {
      const metrics = new MetricsService(createTestConfigService());
      const registry = new InstrumentRegistry(
        minimalDefinition({ main: [{ type: 'accumulate', gauge: 'test_level', from: 'value', scale: 1 }] }),
        metrics,
      );

      expect(() => registry.initialize()).toThrow('Activity main accumulates value before storing it');
    });

    it('should reject a step naming an undeclared instrument', () => {
      const metrics = new MetricsService(createTestConfigService());
      const registry = new InstrumentRegistry(
        minimalDefinition({ main: [{ type: 'increment', counter: 'missing_total' }] }),
        metrics,
      );

      expect(() => registry.initialize()).toThrow('No counter named missing_total in test-service');
    });

    it('should reject references to undeclared activities', () => {
      const metrics = new MetricsService(createTestConfigService());
      const registry = new InstrumentRegistry(minimalDefinition({ other: [{ type: 'region' }] }), metrics);

      expect(() => registry.initialize()).toThrow('test-service references undeclared activity main');
    });

    it('should reject a region list that differs from the counter labels', () => {
      const metrics = new MetricsService(createTestConfigService());
      const registry = new InstrumentRegistry(minimalDefinition({ main: [{ type: 'region' }] }, ['r1', 'r2']), metrics);

      expect(() => registry.initialize()).toThrow('Label region of test-service does not match its enumeration');
    });
  });

  describe('lookups', () => {
    it('should know its regions and endpoints', () => {
      const { registry } = createSimulationHarness(commerceDefinition);

      expect(registry.hasRegion('ca-central-1')).toBe(true);
      expect(registry.hasRegion('ap-northeast-1')).toBe(false);
      expect(registry.hasEndpoint('/api/cart')).toBe(true);
      expect(registry.hasEndpoint('/api/users')).toBe(false);
    });

    it('should throw for unknown names', () => {
      const { registry } = createSimulationHarness(commerceDefinition);

      expect(() => registry.counter('nope_total')).toThrow('No counter named nope_total in commerce-analytics');
      expect(() => registry.regionCounter('mars-1')).toThrow('Unknown region mars-1');
      expect(() => registry.endpointTimer('/api/nope')).toThrow('Unknown endpoint /api/nope');
    });

    it('should list instrument names in declaration order', () => {
      const { registry } = createSimulationHarness(demoDefinition);

      expect(registry.instrumentNames()).toEqual(demoDefinition.instruments.map(instrument => instrument.name));
    });

    it('should total a labelled counter', async () => {
      const { registry } = createSimulationHarness(commerceDefinition);

      registry.regionCounter('us-east-1').inc();
      registry.regionCounter('eu-west-1').inc(2);

      expect(await registry.counterTotal('commerce_requests_by_region_total')).toBe(3);
    });
  });
});

describe('GaugeCell', () => {
  const cell = (initial = 5) => {
    const metrics = new MetricsService(createTestConfigService());
    return new GaugeCell('test_gauge', metrics.gauge({ name: 'test_gauge', help: 'Test' }), 0, 10, initial);
  };

  it('should clamp writes into range', () => {
    const gauge = cell();

    expect(gauge.set(-4)).toBe(0);
    expect(gauge.set(42)).toBe(10);
    expect(gauge.add(-3)).toBe(7);
  });

  it('should clamp the initial value', () => {
    expect(cell(99).value).toBe(10);
  });

  it('should raise the lower bound to the floor for one write', () => {
    const gauge = cell(2);

    expect(gauge.add(1, 6)).toBe(6);
    expect(gauge.add(-5)).toBe(1);
  });

  it('should let the upper bound win over the floor', () => {
    expect(cell().set(3, 20)).toBe(10);
  });
});

describe('labelCombinations', () => {
  it('should expand every combination in declaration order', () => {
    expect(labelCombinations({ a: ['1', '2'], b: ['x', 'y'] })).toEqual([
      { a: '1', b: 'x' },
      { a: '1', b: 'y' },
      { a: '2', b: 'x' },
      { a: '2', b: 'y' },
    ]);
  });

  it('should yield one empty combination for no labels', () => {
    expect(labelCombinations({})).toEqual([{}]);
  });
});
