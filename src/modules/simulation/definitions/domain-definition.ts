import { FloatRange, IntRange } from '../../../common/random/random.service';

/** Label name to the enumerated values it may take. */
export type LabelValueSets = Readonly<Record<string, readonly string[]>>;

export interface CounterDefinition {
  kind: 'counter';
  name: string;
  help: string;
  /** Every combination is pre-registered at zero */
  labels?: LabelValueSets;
}

export interface GaugeDefinition {
  kind: 'gauge';
  name: string;
  help: string;
  initial: number;
  /** Inclusive clamp range applied on every mutation */
  min: number;
  max: number;
}

/** Duration instrument, exported in seconds. */
export interface TimerDefinition {
  kind: 'timer';
  name: string;
  help: string;
  labels?: LabelValueSets;
  buckets?: number[];
}

/** Distribution of a unitless or domain-unit value; the unit is part of the name. */
export interface SummaryDefinition {
  kind: 'summary';
  name: string;
  help: string;
}

export type InstrumentDefinition = CounterDefinition | GaugeDefinition | TimerDefinition | SummaryDefinition;

export type InstrumentKind = InstrumentDefinition['kind'];

/**
 * One side effect of an activity. Draws are uniform and independent unless a
 * step names a value stored by an earlier `observe` step.
 */
export type ActivityStep =
  /** +1 on a counter, one value drawn per label */
  | { type: 'increment'; counter: string }
  /** +1 on a labelled counter with the given probability */
  | { type: 'chanceIncrement'; counter: string; probability: number }
  /** Records a draw into a summary; `store` keeps it for later steps */
  | { type: 'observe'; summary: string; range: FloatRange; integer?: boolean; store?: string }
  /** Adds floor(stored value × scale) to a gauge */
  | { type: 'accumulate'; gauge: string; from: string; scale: number }
  /** Adds an integer delta; `floorGauge` raises the lower clamp to that gauge's value */
  | { type: 'delta'; gauge: string; range: IntRange; floorGauge?: string }
  /** Replaces a gauge's value with draw × scale */
  | { type: 'set'; gauge: string; range: IntRange; scale?: number }
  /** Records a millisecond draw into a timer */
  | { type: 'time'; timer: string; range: IntRange }
  /** +1 on one uniformly chosen region's counter */
  | { type: 'region' }
  /** Records a millisecond draw into one uniformly chosen endpoint's timer */
  | { type: 'endpoint'; range: IntRange };

export interface JobDefinition {
  kind: string;
  periodMs: number;
  /** Inclusive number of runs per firing */
  repetitions: IntRange;
  /** Period comes from metrics.simulationIntervalSeconds instead of periodMs */
  configurablePeriod?: boolean;
}

/** Cumulative probability threshold: rolls below `below` pick `kind`. */
export interface BurstSplit {
  below: number;
  kind: string;
}

export interface BurstDefinition {
  periodMs: number;
  repetitions: IntRange;
  /** Pause between two runs of one burst */
  pauseMs: IntRange;
  split: readonly BurstSplit[];
  /** Kind used when the roll is above every threshold */
  fallback: string;
}

export interface SimulationCommand {
  /** Activity kinds run in order; empty means every kind */
  kinds: readonly string[];
  message: string;
}

export interface DomainDefinition {
  /** Service name, exported as the `application` label */
  service: string;
  defaultPort: number;
  instruments: readonly InstrumentDefinition[];
  regions: {
    counter: string;
    values: readonly string[];
  };
  endpoints: {
    timer: string;
    values: readonly string[];
    /** Domain-wide timer also fed by every recorded request */
    requestTimer?: string;
  };
  /** Declaration order is the order runAll() follows */
  activities: Readonly<Record<string, readonly ActivityStep[]>>;
  schedule: {
    jobs: readonly JobDefinition[];
    sweepPeriodMs: number;
    burst: BurstDefinition;
  };
  /** Activity run by GET /api/health-check */
  healthActivity: string;
  /** POST /api/simulate/:type commands, keyed by lower-case type */
  commands: Readonly<Record<string, SimulationCommand>>;
}
