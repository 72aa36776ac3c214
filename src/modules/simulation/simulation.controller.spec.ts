import { HttpStatus } from '@nestjs/common';
import { createDomainTestingModule, createJsonReply } from '../../../test/test-utils';
import { commerceDefinition, demoDefinition, userDefinition } from './definitions';
import { InstrumentRegistry } from './instrument.registry';
import { MetricsEngine } from './metrics.engine';
import { SimulationController } from './simulation.controller';

describe('SimulationController', () => {
  describe('GET /api/health-check', () => {
    it('should report the service and run its health activity', async () => {
      // Arrange
      const module = await createDomainTestingModule(commerceDefinition, [SimulationController]);
      const controller = module.get(SimulationController);
      const registry = module.get(InstrumentRegistry);

      // Act
      const result = controller.healthCheck();

      // Assert
      expect(result).toEqual({
        status: 'healthy',
        service: 'commerce-analytics',
        timestamp: expect.any(String),
        uptime: 'running',
      });
      expect(await registry.counterTotal('commerce_products_views_total')).toBe(1);
    });
  });

  describe('POST /api/simulate/:type', () => {
    it('should run the activity behind an alias', async () => {
      // Arrange
      const module = await createDomainTestingModule(userDefinition, [SimulationController]);
      const controller = module.get(SimulationController);
      const registry = module.get(InstrumentRegistry);
      const reply = createJsonReply();

      // Act
      controller.simulate('logins', reply);

      // Assert
      expect(reply.status).toHaveBeenCalledWith(HttpStatus.OK);
      expect(reply.json).toHaveBeenCalledWith({
        message: 'User login simulated',
        type: 'logins',
        service: 'user-analytics',
        timestamp: expect.any(String),
      });
      expect(await registry.counterTotal('user_logins_total')).toBe(1);
    });

    it('should match aliases case-insensitively and echo the type as given', async () => {
      const module = await createDomainTestingModule(commerceDefinition, [SimulationController]);
      const controller = module.get(SimulationController);
      const registry = module.get(InstrumentRegistry);
      const reply = createJsonReply();

      controller.simulate('ORDERS', reply);

      expect(reply.status).toHaveBeenCalledWith(HttpStatus.OK);
      expect(reply.json).toHaveBeenCalledWith(expect.objectContaining({ type: 'ORDERS' }));
      expect(await registry.counterTotal('commerce_orders_total')).toBe(1);
    });

    it('should run every activity for all when no kinds are listed', async () => {
      const module = await createDomainTestingModule(commerceDefinition, [SimulationController]);
      const controller = module.get(SimulationController);
      const run = jest.spyOn(module.get(MetricsEngine), 'run');

      controller.simulate('all', createJsonReply());

      expect(run.mock.calls.map(([kind]) => kind)).toEqual(commerceDefinition.schedule.jobs.map(job => job.kind));
    });

    it('should leave registrations out of the demo all command', async () => {
      const module = await createDomainTestingModule(demoDefinition, [SimulationController]);
      const controller = module.get(SimulationController);
      const registry = module.get(InstrumentRegistry);

      controller.simulate('all', createJsonReply());

      expect(await registry.counterTotal('app_orders_total')).toBe(1);
      expect(await registry.counterTotal('app_users_registrations_total')).toBe(0);
    });

    it('should answer 400 for an unknown type without touching any metric', async () => {
      // Arrange
      const module = await createDomainTestingModule(commerceDefinition, [SimulationController]);
      const controller = module.get(SimulationController);
      const run = jest.spyOn(module.get(MetricsEngine), 'run');
      const reply = createJsonReply();

      // Act
      controller.simulate('teleport', reply);

      // Assert
      expect(reply.status).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST);
      expect(reply.json).toHaveBeenCalledWith({ error: 'Unknown simulation type' });
      expect(run).not.toHaveBeenCalled();
    });

    it('should not resolve inherited object keys as types', async () => {
      const module = await createDomainTestingModule(commerceDefinition, [SimulationController]);
      const controller = module.get(SimulationController);
      const reply = createJsonReply();

      controller.simulate('constructor', reply);

      expect(reply.status).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST);
    });
  });
});
