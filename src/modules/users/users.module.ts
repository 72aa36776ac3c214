import { Module } from '@nestjs/common';
import { UsersController } from './users.controller';

/**
 * Users module for the user analytics service.
 *
 * @remarks
 * The metrics engine and request pipeline are injected from the global
 * SimulationModule bound to the user domain.
 *
 * @example
 * ```typescript
 * AppModule.forDomain('user') // imports UsersModule
 * ```
 */
@Module({
  /** Controllers providing user analytics endpoints */
  controllers: [UsersController],
})
export class UsersModule {}
