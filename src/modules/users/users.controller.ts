import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query, Res } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { v4 as uuidv4 } from 'uuid';
import { JsonReply } from '../../common/http/json-reply';
import { RandomService } from '../../common/random/random.service';
import { USER_TYPES } from '../simulation/definitions/user.definition';
import { RequestSimulator } from '../simulation/request.simulator';

/** Share of authentications answered with 200; the rest get 401 */
export const AUTH_SUCCESS_RATE = 0.85;

const SESSION_TTL_MS = 60 * 60 * 1000;

/**
 * Users controller for the user analytics service.
 * Every handler feeds the user metrics through the shared request pipeline.
 *
 * @remarks
 * This controller handles:
 * - User listing and registration
 * - Profile lookups
 * - Authentication attempts, about 15% of them rejected
 * - Session starts
 */
@ApiTags('users')
@Controller('api/users')
export class UsersController {
  constructor(
    private readonly requests: RequestSimulator,
    private readonly random: RandomService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Get all users', description: 'Retrieve a page of users' })
  @ApiResponse({ status: 200, description: 'Users retrieved successfully' })
  findAll() {
    return this.requests.handle({
      method: 'GET',
      endpoint: '/api/users',
      delayMs: { min: 50, max: 300 },
      kinds: ['activity', 'region'],
      respond: () => ({
        users: this.random.repeat({ min: 5, max: 14 }, () => ({
          id: this.random.int({ min: 1000, max: 99998 }),
          userType: this.random.pick(USER_TYPES),
          active: this.random.chance(0.5),
        })),
        total: this.random.int({ min: 100, max: 999 }),
        timestamp: new Date().toISOString(),
      }),
    });
  }

  /**
   * Registers a user.
   * Any body is accepted; nothing in it is stored.
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Create user', description: 'Create a new user account' })
  @ApiResponse({ status: 200, description: 'User created successfully' })
  create(@Body() _user: Record<string, unknown>) {
    return this.requests.handle({
      method: 'POST',
      endpoint: '/api/users',
      delayMs: { min: 100, max: 500 },
      kinds: ['registration', 'activity'],
      respond: () => ({
        id: this.random.int({ min: 1000, max: 99998 }),
        userType: this.random.pick(USER_TYPES),
        created: new Date().toISOString(),
      }),
    });
  }

  @Get('profile')
  @ApiOperation({ summary: 'Get user profile' })
  @ApiQuery({ name: 'userId', required: false, description: 'Defaults to 1' })
  @ApiResponse({ status: 200, description: 'Profile retrieved successfully' })
  getProfile(@Query('userId') userId?: string) {
    return this.requests.handle({
      method: 'GET',
      endpoint: '/api/users/profile',
      delayMs: { min: 75, max: 400 },
      kinds: ['activity', 'endpoint'],
      respond: () => ({
        userId: userId ?? '1',
        profileViews: this.random.int({ min: 1, max: 99 }),
        lastLogin: new Date(Date.now() - this.random.int({ min: 0, max: 3599 }) * 1000).toISOString(),
        timestamp: new Date().toISOString(),
      }),
    });
  }

  /**
   * Authenticates a user.
   * The outcome is drawn independently of the login counter's success label.
   */
  @Post('auth')
  @ApiOperation({ summary: 'Authenticate user' })
  @ApiResponse({ status: 200, description: 'Authenticated' })
  @ApiResponse({ status: 401, description: 'Authentication failed' })
  async authenticate(@Body() _credentials: Record<string, unknown>, @Res() reply: JsonReply) {
    const result = await this.requests.handle({
      method: 'POST',
      endpoint: '/api/users/auth',
      delayMs: { min: 200, max: 800 },
      kinds: ['login', 'activity'],
      respond: () => {
        const success = this.random.chance(AUTH_SUCCESS_RATE);
        return {
          success,
          body: {
            success,
            userId: success ? this.random.int({ min: 1000, max: 99998 }) : null,
            token: success ? uuidv4() : null,
            timestamp: new Date().toISOString(),
          },
        };
      },
    });

    return reply.status(result.success ? HttpStatus.OK : HttpStatus.UNAUTHORIZED).json(result.body);
  }

  @Post('sessions')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Start session' })
  @ApiResponse({ status: 200, description: 'Session started' })
  startSession(@Body() _session: Record<string, unknown>) {
    return this.requests.handle({
      method: 'POST',
      endpoint: '/api/users/sessions',
      delayMs: { min: 50, max: 200 },
      kinds: ['session', 'activity'],
      respond: () => {
        const started = Date.now();
        return {
          sessionId: uuidv4(),
          userId: this.random.int({ min: 1000, max: 99998 }),
          started: new Date(started).toISOString(),
          expiresAt: new Date(started + SESSION_TTL_MS).toISOString(),
        };
      },
    });
  }
}
