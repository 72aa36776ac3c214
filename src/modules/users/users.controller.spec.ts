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
import { userDefinition } from '../simulation/definitions';
import { InstrumentRegistry } from '../simulation/instrument.registry';
import { MetricsEngine } from '../simulation/metrics.engine';
import { UsersController } from './users.controller';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('UsersController', () => {
  let module: TestingModule;
  let controller: UsersController;
  let registry: InstrumentRegistry;

  async function setup(source: RandomSource = new SeededRandomSource()) {
    module = await createDomainTestingModule(userDefinition, [UsersController], source);
    controller = module.get(UsersController);
    registry = module.get(InstrumentRegistry);
  }

  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(async () => {
    jest.useRealTimers();
    await module.close();
  });

  describe('GET /api/users', () => {
    it('should return a page of users and count the region', async () => {
      // Arrange
      await setup();

      // Act
      const result = await settle(controller.findAll());

      // Assert
      expect(result.users.length).toBeGreaterThanOrEqual(5);
      expect(result.users.length).toBeLessThanOrEqual(14);
      expect(await registry.counterTotal('user_engagement_total')).toBe(1);
      expect(await registry.counterTotal('user_requests_by_region_total')).toBe(1);
    });
  });

  describe('POST /api/users', () => {
    it('should count a registration', async () => {
      await setup();

      const result = await settle(controller.create({ name: 'Test User' }));

      expect(result.created).toEqual(expect.any(String));
      expect(await registry.counterTotal('user_registrations_total')).toBe(1);
    });
  });

  describe('GET /api/users/profile', () => {
    it('should default the user id to 1', async () => {
      await setup();

      const result = await settle(controller.getProfile());

      expect(result.userId).toBe('1');
    });
  });

  describe('POST /api/users/auth', () => {
    it('should answer 200 with a token when authentication succeeds', async () => {
      // Arrange
      await setup(new SequenceRandomSource([0]));
      const reply = createJsonReply();

      // Act
      await settle(controller.authenticate({ username: 'test-user', password: 'test-secret' }, reply));

      // Assert
      expect(reply.status).toHaveBeenCalledWith(HttpStatus.OK);
      expect(reply.json).toHaveBeenCalledWith({
        success: true,
        userId: 1000,
        token: expect.stringMatching(UUID_V4),
        timestamp: expect.any(String),
      });
      expect(await registry.counterTotal('user_logins_total')).toBe(1);
    });

    it('should answer 401 without user or token when authentication fails', async () => {
      await setup(new SequenceRandomSource([0.95]));
      const reply = createJsonReply();

      await settle(controller.authenticate({}, reply));

      expect(reply.status).toHaveBeenCalledWith(HttpStatus.UNAUTHORIZED);
      expect(reply.json).toHaveBeenCalledWith({
        success: false,
        userId: null,
        token: null,
        timestamp: expect.any(String),
      });
    });
  });

  describe('POST /api/users/sessions', () => {
    it('should start a one hour session', async () => {
      // Arrange
      await setup();

      // Act
      const result = await settle(controller.startSession({}));

      // Assert
      expect(result.sessionId).toMatch(UUID_V4);
      expect(Date.parse(result.expiresAt) - Date.parse(result.started)).toBe(60 * 60 * 1000);
      expect(await registry.counterTotal('user_sessions_total')).toBe(1);
      expect(module.get(MetricsEngine).gaugeValue('user_session_duration_total_seconds')).toBeGreaterThanOrEqual(60);
    });
  });
});
