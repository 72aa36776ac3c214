import { HttpStatus } from '@nestjs/common';
import { TestingModule } from '@nestjs/testing';
import {
  SeededRandomSource,
  SequenceRandomSource,
  createDomainTestingModule,
  createJsonReply,
  settle,
} from '../../../test/test-utils';
import { RandomSource } from '../../common/random/random.service';
import { demoDefinition } from '../simulation/definitions';
import { InstrumentRegistry } from '../simulation/instrument.registry';
import { DemoController } from './demo.controller';

describe('DemoController', () => {
  let module: TestingModule;
  let controller: DemoController;
  let registry: InstrumentRegistry;

  async function setup(source: RandomSource = new SeededRandomSource()) {
    module = await createDomainTestingModule(demoDefinition, [DemoController], source);
    controller = module.get(DemoController);
    registry = module.get(InstrumentRegistry);
  }

  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(async () => {
    jest.useRealTimers();
    await module.close();
  });

  it('should count a request and a region for GET /api/users', async () => {
    await setup();

    await settle(controller.getUsers());

    expect(await registry.counterTotal('app_requests_total')).toBe(1);
    expect(await registry.counterTotal('app_requests_by_region_total')).toBe(1);
  });

  it('should count a registration for POST /api/users', async () => {
    await setup();

    await settle(controller.createUser({}));

    expect(await registry.counterTotal('app_users_registrations_total')).toBe(1);
  });

  it('should count an order for POST /api/orders', async () => {
    await setup();

    const result = await settle(controller.createOrder({}));

    expect(result.status).toBe('confirmed');
    expect(await registry.counterTotal('app_orders_total')).toBe(1);
  });

  it('should return between 8 and 19 products', async () => {
    await setup();

    const result = await settle(controller.getProducts());

    expect(result.products.length).toBeGreaterThanOrEqual(8);
    expect(result.products.length).toBeLessThanOrEqual(19);
  });

  it('should answer 402 for a declined payment', async () => {
    // Arrange
    await setup(new SequenceRandomSource([0.95]));
    const reply = createJsonReply();

    // Act
    await settle(controller.processPayment({}, reply));

    // Assert
    expect(reply.status).toHaveBeenCalledWith(HttpStatus.PAYMENT_REQUIRED);
    expect(reply.json).toHaveBeenCalledWith(expect.objectContaining({ status: 'failed' }));
  });
});
