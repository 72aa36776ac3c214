import { Injectable, Logger } from '@nestjs/common';
import { FloatRange, RandomService } from '../../common/random/random.service';
import { sleep } from '../../common/utils/sleep';
import { MetricsEngine } from './metrics.engine';

export interface SimulatedRequest<T> {
  method: 'GET' | 'POST';
  /** Path recorded in the endpoint timer */
  endpoint: string;
  /** Processing delay in milliseconds, [min, max) */
  delayMs: FloatRange;
  /** Activities run after the delay, in order */
  kinds: readonly string[];
  respond: () => T;
}

/**
 * Shared request pipeline for the domain controllers: wait, mutate, time.
 */
@Injectable()
export class RequestSimulator {
  private readonly logger = new Logger(RequestSimulator.name);

  constructor(
    private readonly engine: MetricsEngine,
    private readonly random: RandomService,
  ) {}

  async handle<T>(request: SimulatedRequest<T>): Promise<T> {
    const startedAt = Date.now();

    await sleep(Math.floor(this.random.float(request.delayMs)));
    for (const kind of request.kinds) {
      this.engine.run(kind);
    }
    const body = request.respond();

    const elapsedMs = Date.now() - startedAt;
    this.engine.recordRequest(request.endpoint, elapsedMs);
    this.logger.log(`${request.method} ${request.endpoint} processed in ${elapsedMs}ms`);

    return body;
  }
}
