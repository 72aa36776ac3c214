import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { Counter, Gauge, Histogram, Summary } from 'prom-client';
import { MetricsService } from '../../common/metrics/metrics.service';
import { DOMAIN_DEFINITION } from './simulation.constants';
import {
  ActivityStep,
  CounterDefinition,
  DomainDefinition,
  GaugeDefinition,
  InstrumentDefinition,
  InstrumentKind,
  LabelValueSets,
  SummaryDefinition,
  TimerDefinition,
} from './definitions';

export type LabelSet = Record<string, string>;

/** Quantiles exported by every distribution summary */
export const SUMMARY_PERCENTILES = [0.5, 0.9, 0.95, 0.99];

/**
 * Every combination of the enumerated label values, in declaration order.
 * An empty set yields a single empty combination.
 */
export function labelCombinations(sets: LabelValueSets): LabelSet[] {
  let combinations: LabelSet[] = [{}];
  for (const [label, values] of Object.entries(sets)) {
    const next: LabelSet[] = [];
    for (const combination of combinations) {
      for (const value of values) {
        next.push({ ...combination, [label]: value });
      }
    }
    combinations = next;
  }
  return combinations;
}

/** A counter together with the values each of its labels may take */
export class CounterFamily {
  constructor(
    readonly name: string,
    readonly metric: Counter<string>,
    readonly labels: LabelValueSets,
  ) {}

  get labelled(): boolean {
    return Object.keys(this.labels).length > 0;
  }

  increment(labels: LabelSet = {}): void {
    if (this.labelled) {
      this.metric.inc(labels);
    } else {
      this.metric.inc();
    }
  }
}

/**
 * Gauge value cell clamped into [min, max] on every write.
 * The cell is the source of truth; the prom-client gauge mirrors it.
 */
export class GaugeCell {
  private current = 0;

  constructor(
    readonly name: string,
    private readonly metric: Gauge<string>,
    readonly min: number,
    readonly max: number,
    initial: number,
  ) {
    this.set(initial);
  }

  get value(): number {
    return this.current;
  }

  /**
   * Stores value clamped into range. `floor` raises the lower bound for this
   * write only; the upper bound always wins.
   */
  set(value: number, floor = this.min): number {
    const lower = Math.max(this.min, floor);
    this.current = Math.min(this.max, Math.max(lower, value));
    this.metric.set(this.current);
    return this.current;
  }

  add(delta: number, floor?: number): number {
    return this.set(this.current + delta, floor);
  }
}

/** Histogram of durations; callers record milliseconds, export is in seconds */
export class TimerFamily {
  constructor(
    readonly name: string,
    readonly metric: Histogram<string>,
    readonly labels: LabelValueSets,
  ) {}

  record(durationMs: number, labels?: LabelSet): void {
    const seconds = durationMs / 1000;
    if (labels) {
      this.metric.observe(labels, seconds);
    } else {
      this.metric.observe(seconds);
    }
  }
}

/**
 * Creates every instrument of the active domain on module init and serves
 * lookups by name.
 *
 * @remarks
 * Labelled counters are pre-registered for the full cross-product of their
 * label values and labelled timers are zeroed per value, so the exposition
 * lists every series before the first mutation. Registration goes through
 * MetricsService's create-or-fetch, which makes initialize() safe to repeat.
 */
@Injectable()
export class InstrumentRegistry implements OnModuleInit {
  private readonly logger = new Logger(InstrumentRegistry.name);

  private readonly counters = new Map<string, CounterFamily>();
  private readonly gauges = new Map<string, GaugeCell>();
  private readonly timers = new Map<string, TimerFamily>();
  private readonly summaries = new Map<string, Summary<string>>();
  private initialized = false;

  constructor(
    @Inject(DOMAIN_DEFINITION) private readonly definition: DomainDefinition,
    private readonly metricsService: MetricsService,
  ) {}

  onModuleInit(): void {
    this.initialize();
  }

  /**
   * Registers every instrument of the domain definition.
   * @throws Error when the definition references an instrument or activity it does not declare
   */
  initialize(): void {
    if (this.initialized) {
      this.logger.debug(`Instruments for ${this.definition.service} already initialized`);
      return;
    }

    this.metricsService.addCommonLabels({ application: this.definition.service });

    for (const instrument of this.definition.instruments) {
      this.register(instrument);
    }
    this.validateReferences();

    this.initialized = true;
    this.logger.log(
      `Registered ${this.definition.instruments.length} instruments for ${this.definition.service} ` +
        `(${this.definition.regions.values.length} regions, ${this.definition.endpoints.values.length} endpoints)`,
    );
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  counter(name: string): CounterFamily {
    return this.lookup(this.counters, name, 'counter');
  }

  gauge(name: string): GaugeCell {
    return this.lookup(this.gauges, name, 'gauge');
  }

  timer(name: string): TimerFamily {
    return this.lookup(this.timers, name, 'timer');
  }

  summary(name: string): Summary<string> {
    return this.lookup(this.summaries, name, 'summary');
  }

  /** Series of the region counter for one region */
  regionCounter(region: string): Counter.Internal {
    if (!this.hasRegion(region)) {
      throw new Error(`Unknown region ${region}`);
    }
    return this.counter(this.definition.regions.counter).metric.labels({ region });
  }

  /** Series of the endpoint timer for one endpoint; observations are in seconds */
  endpointTimer(endpoint: string): Histogram.Internal<string> {
    if (!this.hasEndpoint(endpoint)) {
      throw new Error(`Unknown endpoint ${endpoint}`);
    }
    return this.timer(this.definition.endpoints.timer).metric.labels({ endpoint });
  }

  hasRegion(region: string): boolean {
    return this.definition.regions.values.includes(region);
  }

  hasEndpoint(endpoint: string): boolean {
    return this.definition.endpoints.values.includes(endpoint);
  }

  /** Names of the domain's instruments in declaration order */
  instrumentNames(): string[] {
    return this.definition.instruments.map(instrument => instrument.name);
  }

  /** Sum of every series of a counter */
  async counterTotal(name: string): Promise<number> {
    return this.metricsService.total(this.counter(name).name);
  }

  private register(instrument: InstrumentDefinition): void {
    switch (instrument.kind) {
      case 'counter':
        this.registerCounter(instrument);
        break;
      case 'gauge':
        this.registerGauge(instrument);
        break;
      case 'timer':
        this.registerTimer(instrument);
        break;
      case 'summary':
        this.registerSummary(instrument);
        break;
    }
  }

  private registerCounter(definition: CounterDefinition): void {
    const labels = definition.labels ?? {};
    const metric = this.metricsService.counter({
      name: definition.name,
      help: definition.help,
      labelNames: Object.keys(labels),
    });
    const family = new CounterFamily(definition.name, metric, labels);

    if (family.labelled) {
      for (const combination of labelCombinations(labels)) {
        metric.inc(combination, 0);
      }
    }
    this.counters.set(definition.name, family);
  }

  private registerGauge(definition: GaugeDefinition): void {
    const metric = this.metricsService.gauge({ name: definition.name, help: definition.help });
    this.gauges.set(
      definition.name,
      new GaugeCell(definition.name, metric, definition.min, definition.max, definition.initial),
    );
  }

  private registerTimer(definition: TimerDefinition): void {
    const labels = definition.labels ?? {};
    const metric = this.metricsService.histogram({
      name: definition.name,
      help: definition.help,
      labelNames: Object.keys(labels),
      ...(definition.buckets ? { buckets: definition.buckets } : {}),
    });

    if (Object.keys(labels).length > 0) {
      for (const combination of labelCombinations(labels)) {
        metric.zero(combination);
      }
    }
    this.timers.set(definition.name, new TimerFamily(definition.name, metric, labels));
  }

  private registerSummary(definition: SummaryDefinition): void {
    const metric = this.metricsService.summary({
      name: definition.name,
      help: definition.help,
      percentiles: SUMMARY_PERCENTILES,
      maxAgeSeconds: 120,
      ageBuckets: 5,
    });
    this.summaries.set(definition.name, metric);
  }

  private validateReferences(): void {
    const { regions, endpoints, activities, schedule, healthActivity, commands } = this.definition;

    this.expectLabels(this.counter(regions.counter).labels, 'region', regions.values);
    this.expectLabels(this.timer(endpoints.timer).labels, 'endpoint', endpoints.values);
    if (endpoints.requestTimer) {
      this.timer(endpoints.requestTimer);
    }

    for (const [kind, steps] of Object.entries(activities)) {
      const stored = new Set<string>();
      for (const step of steps) {
        this.validateStep(kind, step, stored);
      }
    }

    const referenced = [
      ...schedule.jobs.map(job => job.kind),
      ...schedule.burst.split.map(split => split.kind),
      schedule.burst.fallback,
      healthActivity,
      ...Object.values(commands).flatMap(command => command.kinds),
    ];
    for (const kind of referenced) {
      if (!Object.prototype.hasOwnProperty.call(activities, kind)) {
        throw new Error(`${this.definition.service} references undeclared activity ${kind}`);
      }
    }
  }

  private validateStep(kind: string, step: ActivityStep, stored: Set<string>): void {
    switch (step.type) {
      case 'increment':
        this.counter(step.counter);
        break;
      case 'chanceIncrement':
        this.counter(step.counter);
        break;
      case 'observe':
        this.summary(step.summary);
        if (step.store) {
          stored.add(step.store);
        }
        break;
      case 'accumulate':
        this.gauge(step.gauge);
        if (!stored.has(step.from)) {
          throw new Error(`Activity ${kind} accumulates ${step.from} before storing it`);
        }
        break;
      case 'delta':
        this.gauge(step.gauge);
        if (step.floorGauge) {
          this.gauge(step.floorGauge);
        }
        break;
      case 'set':
        this.gauge(step.gauge);
        break;
      case 'time':
        this.timer(step.timer);
        break;
      case 'region':
      case 'endpoint':
        break;
    }
  }

  private expectLabels(labels: LabelValueSets, label: string, values: readonly string[]): void {
    const declared = labels[label];
    if (!declared || declared.length !== values.length || values.some(value => !declared.includes(value))) {
      throw new Error(`Label ${label} of ${this.definition.service} does not match its enumeration`);
    }
  }

  private lookup<T>(instruments: Map<string, T>, name: string, kind: InstrumentKind): T {
    const instrument = instruments.get(name);
    if (instrument === undefined) {
      throw new Error(`No ${kind} named ${name} in ${this.definition.service}`);
    }
    return instrument;
  }
}
