import { Inject, Injectable, Logger } from '@nestjs/common';
import { RandomService } from '../../common/random/random.service';
import { ActivityStep, DomainDefinition, LabelValueSets } from './definitions';
import { InstrumentRegistry, LabelSet } from './instrument.registry';
import { DOMAIN_DEFINITION } from './simulation.constants';

/**
 * Metrics mutator: one operation per activity kind of the active domain.
 *
 * @remarks
 * Each step draws independently from RandomService. Every update is a
 * synchronous prom-client call on the event loop thread, so concurrent
 * callers (scheduler firings, bursts, requests) interleave only between
 * whole runs and never lose an increment.
 */
@Injectable()
export class MetricsEngine {
  private readonly logger = new Logger(MetricsEngine.name);

  constructor(
    @Inject(DOMAIN_DEFINITION) private readonly definition: DomainDefinition,
    private readonly registry: InstrumentRegistry,
    private readonly random: RandomService,
  ) {}

  get service(): string {
    return this.definition.service;
  }

  /** Activity kinds in declaration order */
  kinds(): string[] {
    return Object.keys(this.definition.activities);
  }

  hasKind(kind: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.definition.activities, kind);
  }

  /**
   * Performs one activity
   * @throws Error when kind is not an activity of this domain
   */
  run(kind: string): void {
    if (!this.hasKind(kind)) {
      throw new Error(`Unknown activity ${kind} for ${this.definition.service}`);
    }

    const stored = new Map<string, number>();
    const trace = this.definition.activities[kind].map(step => this.apply(step, stored));
    this.logger.debug(`${kind}: ${trace.join(', ')}`);
  }

  /** Every activity once, in declaration order */
  runAll(): void {
    for (const kind of this.kinds()) {
      this.run(kind);
    }
  }

  /**
   * Records a served request into the endpoint's timer and, where the domain
   * has one, its request-wide timer. Unknown endpoints are ignored.
   */
  recordRequest(endpoint: string, durationMs: number): void {
    if (!this.registry.hasEndpoint(endpoint)) {
      this.logger.debug(`Ignoring request timing for unknown endpoint ${endpoint}`);
      return;
    }

    this.registry.endpointTimer(endpoint).observe(durationMs / 1000);
    const { requestTimer } = this.definition.endpoints;
    if (requestTimer) {
      this.registry.timer(requestTimer).record(durationMs);
    }
  }

  gaugeValue(name: string): number {
    return this.registry.gauge(name).value;
  }

  private apply(step: ActivityStep, stored: Map<string, number>): string {
    switch (step.type) {
      case 'increment': {
        const family = this.registry.counter(step.counter);
        const labels = this.drawLabels(family.labels);
        family.increment(labels);
        return `${step.counter}${this.format(labels)}+1`;
      }
      case 'chanceIncrement': {
        if (!this.random.chance(step.probability)) {
          return `${step.counter} skipped`;
        }
        const family = this.registry.counter(step.counter);
        const labels = this.drawLabels(family.labels);
        family.increment(labels);
        return `${step.counter}${this.format(labels)}+1`;
      }
      case 'observe': {
        const value = step.integer ? this.random.int(step.range) : this.random.float(step.range);
        this.registry.summary(step.summary).observe(value);
        if (step.store) {
          stored.set(step.store, value);
        }
        return `${step.summary}=${this.round(value)}`;
      }
      case 'accumulate': {
        const value = stored.get(step.from);
        if (value === undefined) {
          throw new Error(`No ${step.from} drawn before accumulating into ${step.gauge}`);
        }
        const result = this.registry.gauge(step.gauge).add(Math.floor(value * step.scale));
        return `${step.gauge}=${result}`;
      }
      case 'delta': {
        const delta = this.random.int(step.range);
        const floor = step.floorGauge ? this.registry.gauge(step.floorGauge).value : undefined;
        const result = this.registry.gauge(step.gauge).add(delta, floor);
        return `${step.gauge}${delta >= 0 ? '+' : ''}${delta}=${result}`;
      }
      case 'set': {
        const value = this.random.int(step.range) * (step.scale ?? 1);
        const result = this.registry.gauge(step.gauge).set(value);
        return `${step.gauge}=${result}`;
      }
      case 'time': {
        const durationMs = this.random.int(step.range);
        this.registry.timer(step.timer).record(durationMs);
        return `${step.timer}=${durationMs}ms`;
      }
      case 'region': {
        const region = this.random.pick(this.definition.regions.values);
        this.registry.regionCounter(region).inc();
        return `region=${region}`;
      }
      case 'endpoint': {
        const endpoint = this.random.pick(this.definition.endpoints.values);
        const durationMs = this.random.int(step.range);
        this.registry.endpointTimer(endpoint).observe(durationMs / 1000);
        return `${endpoint}=${durationMs}ms`;
      }
      default: {
        const unknown: never = step;
        throw new Error(`Unsupported activity step ${JSON.stringify(unknown)}`);
      }
    }
  }

  private drawLabels(labels: LabelValueSets): LabelSet {
    const drawn: LabelSet = {};
    for (const [label, values] of Object.entries(labels)) {
      drawn[label] = this.random.pick(values);
    }
    return drawn;
  }

  private format(labels: LabelSet): string {
    const pairs = Object.entries(labels).map(([label, value]) => `${label}=${value}`);
    return pairs.length > 0 ? `{${pairs.join(',')}}` : '';
  }

  private round(value: number): number {
    return Math.round(value * 100) / 100;
  }
}
