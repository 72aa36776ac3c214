import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  Registry,
  collectDefaultMetrics,
  Counter,
  Gauge,
  Histogram,
  Summary,
  Metric,
  CounterConfiguration,
  GaugeConfiguration,
  HistogramConfiguration,
  SummaryConfiguration,
} from 'prom-client';

type MetricClass<M> = abstract new (...args: never[]) => M;

/**
 * Metrics backend using the Prometheus client
 *
 * Owns a dedicated prom-client Registry (never the global one) so several
 * application contexts can coexist in one process. Registration is
 * create-or-fetch: asking twice for the same name returns the instrument
 * created the first time.
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);
  private readonly registry = new Registry();

  // HTTP request metrics
  private readonly httpRequestDuration: Histogram<string>;
  private readonly httpRequestsTotal: Counter<string>;

  constructor(private readonly configService: ConfigService) {
    this.registry.setDefaultLabels(this.configService.get<Record<string, string>>('metrics.commonLabels', {}));

    if (this.configService.get<boolean>('metrics.collectDefaultMetrics', true)) {
      // Node.js runtime metrics (CPU, memory, event loop, etc.)
      collectDefaultMetrics({ register: this.registry });
    }

    this.httpRequestDuration = this.histogram({
      name: 'http_server_requests_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'route', 'status_code'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    });

    this.httpRequestsTotal = this.counter({
      name: 'http_server_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status_code'],
    });
  }

  /** Registers a counter, or returns the one already registered under that name */
  counter(configuration: Omit<CounterConfiguration<string>, 'registers'>): Counter<string> {
    return this.getOrCreate(configuration.name, Counter, () => new Counter({ ...configuration, registers: [this.registry] }));
  }

  /** Registers a gauge, or returns the one already registered under that name */
  gauge(configuration: Omit<GaugeConfiguration<string>, 'registers'>): Gauge<string> {
    return this.getOrCreate(configuration.name, Gauge, () => new Gauge({ ...configuration, registers: [this.registry] }));
  }

  /** Registers a histogram, or returns the one already registered under that name */
  histogram(configuration: Omit<HistogramConfiguration<string>, 'registers'>): Histogram<string> {
    return this.getOrCreate(
      configuration.name,
      Histogram,
      () => new Histogram({ ...configuration, registers: [this.registry] }),
    );
  }

  /** Registers a summary, or returns the one already registered under that name */
  summary(configuration: Omit<SummaryConfiguration<string>, 'registers'>): Summary<string> {
    return this.getOrCreate(
      configuration.name,
      Summary,
      () => new Summary({ ...configuration, registers: [this.registry] }),
    );
  }

  /**
   * Records HTTP request metrics
   * @param method - HTTP method (GET, POST, etc.)
   * @param route - Route pattern, not the concrete URL, to keep cardinality bounded
   * @param statusCode - HTTP response status code
   * @param duration - Request duration in seconds
   */
  recordHttpRequest(method: string, route: string, statusCode: number, duration: number) {
    const labels = { method, route, status_code: statusCode.toString() };
    this.httpRequestDuration.observe(labels, duration);
    this.httpRequestsTotal.inc(labels);
  }

  /** Merges labels into the set applied to every exported series */
  addCommonLabels(labels: Record<string, string>) {
    const current = this.configService.get<Record<string, string>>('metrics.commonLabels', {});
    this.registry.setDefaultLabels({ ...current, ...labels });
  }

  /**
   * Sum of every series of a counter or gauge; 0 when the metric is unknown
   */
  async total(name: string): Promise<number> {
    const metric = this.registry.getSingleMetric(name);
    if (!metric) {
      return 0;
    }
    const data = await metric.get();
    let sum = 0;
    for (const entry of data.values) {
      sum += entry.value;
    }
    return sum;
  }

  /**
   * Returns all metrics in Prometheus text format
   * @returns Promise resolving to metrics string in Prometheus format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  /** Returns the underlying Prometheus registry */
  getRegistry(): Registry {
    return this.registry;
  }

  private getOrCreate<M extends Metric<string>>(name: string, type: MetricClass<M>, create: () => M): M {
    const existing = this.registry.getSingleMetric(name);
    if (existing instanceof type) {
      return existing;
    }
    if (existing) {
      throw new Error(`Metric ${name} is already registered with a different type`);
    }
    this.logger.debug(`Registered metric ${name}`);
    return create();
  }
}
