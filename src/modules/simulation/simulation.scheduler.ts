import { Inject, Injectable, Logger, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { RandomService } from '../../common/random/random.service';
import { InterruptedError, sleep } from '../../common/utils/sleep';
import { DomainDefinition, JobDefinition } from './definitions';
import { MetricsEngine } from './metrics.engine';
import { DOMAIN_DEFINITION, SIMULATION_JOB_PREFIX } from './simulation.constants';

/**
 * Background scheduler driving the metrics engine
 *
 * Registers one independent interval per job of the active domain, plus the
 * comprehensive sweep and the burst job, in the SchedulerRegistry. No job
 * waits on another: every firing runs to completion on its own and catches
 * its own errors so later firings keep going.
 *
 * @remarks
 * - Nothing is registered when metrics.simulationEnabled is false
 * - Burst pauses are abortable; shutdown interrupts a running burst and
 *   clears every interval this scheduler created
 */
@Injectable()
export class SimulationScheduler implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(SimulationScheduler.name);

  /** Aborted once at shutdown; pending burst pauses reject with InterruptedError */
  private readonly lifecycle = new AbortController();
  private readonly intervalNames: string[] = [];

  constructor(
    @Inject(DOMAIN_DEFINITION) private readonly definition: DomainDefinition,
    private readonly engine: MetricsEngine,
    private readonly random: RandomService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService,
  ) {}

  onApplicationBootstrap(): void {
    if (!this.configService.get<boolean>('metrics.simulationEnabled', true)) {
      this.logger.log('Metrics simulation disabled, no background jobs scheduled');
      return;
    }
    this.start();
  }

  onApplicationShutdown(): void {
    this.lifecycle.abort();
    for (const name of this.intervalNames.splice(0)) {
      if (this.schedulerRegistry.doesExist('interval', name)) {
        this.schedulerRegistry.deleteInterval(name);
      }
    }
    this.logger.log(`Background simulation for ${this.definition.service} stopped`);
  }

  /** Period of a job in milliseconds, honouring the configurable activity interval */
  periodOf(job: JobDefinition): number {
    if (job.configurablePeriod) {
      return this.configService.get<number>('metrics.simulationIntervalSeconds', 5) * 1000;
    }
    return job.periodMs;
  }

  /** Runs one firing of a job: a drawn number of repetitions of its activity */
  fireJob(job: JobDefinition): void {
    try {
      const repetitions = this.random.int(job.repetitions);
      for (let i = 0; i < repetitions; i++) {
        this.engine.run(job.kind);
      }
      this.logger.debug(`Job ${job.kind} ran ${repetitions} time(s)`);
    } catch (error) {
      this.logError(`Simulation job ${job.kind} failed`, error);
    }
  }

  /** Runs every activity once */
  fireSweep(): void {
    this.logger.log('Running comprehensive simulation sweep');
    try {
      this.engine.runAll();
      this.logger.log('Comprehensive simulation sweep finished');
    } catch (error) {
      this.logError('Comprehensive simulation sweep failed', error);
    }
  }

  /**
   * Runs a burst of randomly chosen activities with short pauses in between.
   * Resolves once the burst completes, is interrupted or fails.
   */
  async fireBurst(): Promise<void> {
    const { burst } = this.definition.schedule;
    const repetitions = this.random.int(burst.repetitions);
    let completed = 0;

    this.logger.log(`Burst of ${repetitions} activities started`);
    try {
      for (let i = 0; i < repetitions; i++) {
        if (i > 0) {
          await sleep(this.random.int(burst.pauseMs), this.lifecycle.signal);
        }
        this.engine.run(this.pickBurstKind());
        completed++;
      }
      this.logger.log(`Burst of ${repetitions} activities finished`);
    } catch (error) {
      if (error instanceof InterruptedError) {
        this.logger.warn(`Burst interrupted after ${completed} of ${repetitions} activities`);
        return;
      }
      this.logError('Burst simulation failed', error);
    }
  }

  private start(): void {
    const { jobs, sweepPeriodMs, burst } = this.definition.schedule;

    for (const job of jobs) {
      this.addInterval(job.kind, this.periodOf(job), () => this.fireJob(job));
    }
    this.addInterval('sweep', sweepPeriodMs, () => this.fireSweep());
    this.addInterval('burst', burst.periodMs, () => {
      void this.fireBurst();
    });

    this.logger.log(`Scheduled ${this.intervalNames.length} simulation jobs for ${this.definition.service}`);
  }

  private addInterval(job: string, periodMs: number, callback: () => void): void {
    const name = `${SIMULATION_JOB_PREFIX}:${this.definition.service}:${job}`;
    this.schedulerRegistry.addInterval(name, setInterval(callback, periodMs));
    this.intervalNames.push(name);
  }

  /** Cumulative split: the first threshold above the roll wins */
  private pickBurstKind(): string {
    const { split, fallback } = this.definition.schedule.burst;
    const roll = this.random.float({ min: 0, max: 1 });
    const match = split.find(entry => roll < entry.below);
    return match ? match.kind : fallback;
  }

  private logError(message: string, error: unknown): void {
    if (error instanceof Error) {
      this.logger.error(`${message}: ${error.message}`, error.stack);
    } else {
      this.logger.error(`${message}: ${String(error)}`);
    }
  }
}
