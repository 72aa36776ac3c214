import { DynamicModule, Module } from '@nestjs/common';
import { RANDOM_SOURCE, RandomService, mathRandomSource } from '../../common/random/random.service';
import { DomainDefinition } from './definitions';
import { InstrumentRegistry } from './instrument.registry';
import { MetricsEngine } from './metrics.engine';
import { RequestSimulator } from './request.simulator';
import { SimulationController } from './simulation.controller';
import { DOMAIN_DEFINITION } from './simulation.constants';
import { SimulationScheduler } from './simulation.scheduler';

/**
 * Simulation module bound to one analytics domain.
 *
 * @remarks
 * Registered globally so the domain feature module can inject the engine and
 * the request pipeline without importing this module again. Relies on the
 * global MetricsModule, ConfigModule and ScheduleModule.forRoot().
 *
 * @example
 * ```typescript
 * SimulationModule.forDomain(commerceDefinition)
 * ```
 */
@Module({})
export class SimulationModule {
  static forDomain(definition: DomainDefinition): DynamicModule {
    return {
      module: SimulationModule,
      global: true,

      /** Shared health-check and simulate endpoints */
      controllers: [SimulationController],

      providers: [
        { provide: DOMAIN_DEFINITION, useValue: definition },
        { provide: RANDOM_SOURCE, useValue: mathRandomSource },
        RandomService,
        InstrumentRegistry,
        MetricsEngine,
        RequestSimulator,
        SimulationScheduler,
      ],

      exports: [DOMAIN_DEFINITION, RandomService, InstrumentRegistry, MetricsEngine, RequestSimulator],
    };
  }
}
