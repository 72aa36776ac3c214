import { DynamicModule, Module, Type } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { HealthModule } from './common/health/health.module';
import { MetricsModule } from './common/metrics/metrics.module';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { SimulationModule } from './modules/simulation/simulation.module';
import { AnalyticsDomain, DOMAIN_DEFINITIONS } from './modules/simulation/definitions';
import { CommerceModule } from './modules/commerce/commerce.module';
import { UsersModule } from './modules/users/users.module';
import { DemoModule } from './modules/demo/demo.module';
import { validateEnvironment } from './config/env.validation';
import appConfig from './config/app.config';
import metricsConfig from './config/metrics.config';

/** REST endpoints specific to each analytics domain */
const DOMAIN_MODULES: Record<AnalyticsDomain, Type> = {
  user: UsersModule,
  commerce: CommerceModule,
  demo: DemoModule,
};

@Module({})
export class AppModule {
  /**
   * Root module for one analytics service
   * @param domain - Which instruments, jobs and endpoints this process serves
   */
  static forDomain(domain: AnalyticsDomain): DynamicModule {
    return {
      module: AppModule,
      imports: [
        // Configuration
        ConfigModule.forRoot({
          isGlobal: true,
          load: [appConfig, metricsConfig],
          validate: validateEnvironment,
        }),

        // Scheduling
        ScheduleModule.forRoot(),

        // Metrics
        MetricsModule,

        // Simulation engine for the selected domain
        SimulationModule.forDomain(DOMAIN_DEFINITIONS[domain]),

        // Feature module
        DOMAIN_MODULES[domain],

        // Health checks
        HealthModule,
      ],
      providers: [
        { provide: APP_FILTER, useClass: AllExceptionsFilter },
        { provide: APP_INTERCEPTOR, useClass: LoggingInterceptor },
      ],
    };
  }
}
