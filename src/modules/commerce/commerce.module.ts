import { Module } from '@nestjs/common';
import { CommerceController } from './commerce.controller';

/**
 * Commerce analytics feature module.
 * The engine and request pipeline come from the global SimulationModule.
 */
@Module({
  /** Order, payment, product and cart endpoints */
  controllers: [CommerceController],
})
export class CommerceModule {}
