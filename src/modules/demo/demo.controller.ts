import { Body, Controller, Get, HttpCode, HttpStatus, Post, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JsonReply } from '../../common/http/json-reply';
import { RandomService } from '../../common/random/random.service';
import { RequestSimulator } from '../simulation/request.simulator';
import { ORDER_STATUSES, PAYMENT_SUCCESS_RATE } from '../commerce/commerce.controller';

/**
 * Endpoints of the single-module demo service, mixing user and order
 * traffic under the `app_` metrics.
 */
@ApiTags('demo')
@Controller('api')
export class DemoController {
  constructor(
    private readonly requests: RequestSimulator,
    private readonly random: RandomService,
  ) {}

  @Get('users')
  @ApiOperation({ summary: 'List users' })
  @ApiResponse({ status: 200, description: 'Users retrieved' })
  getUsers() {
    return this.requests.handle({
      method: 'GET',
      endpoint: '/api/users',
      delayMs: { min: 50, max: 300 },
      kinds: ['activity', 'region'],
      respond: () => ({
        users: this.random.repeat({ min: 5, max: 14 }, () => ({
          id: this.random.int({ min: 1000, max: 99998 }),
          active: this.random.chance(0.5),
        })),
        total: this.random.int({ min: 100, max: 999 }),
        timestamp: new Date().toISOString(),
      }),
    });
  }

  @Post('users')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Create user' })
  @ApiResponse({ status: 200, description: 'User created' })
  createUser(@Body() _user: Record<string, unknown>) {
    return this.requests.handle({
      method: 'POST',
      endpoint: '/api/users',
      delayMs: { min: 100, max: 500 },
      kinds: ['registration', 'activity', 'database'],
      respond: () => ({
        id: this.random.int({ min: 1000, max: 99998 }),
        created: new Date().toISOString(),
      }),
    });
  }

  @Get('orders')
  @ApiOperation({ summary: 'List orders' })
  @ApiResponse({ status: 200, description: 'Orders retrieved' })
  getOrders() {
    return this.requests.handle({
      method: 'GET',
      endpoint: '/api/orders',
      delayMs: { min: 75, max: 400 },
      kinds: ['order', 'database', 'region'],
      respond: () => ({
        orders: this.random.repeat({ min: 3, max: 9 }, () => ({
          id: this.random.int({ min: 10000, max: 999998 }),
          total: this.random.amount({ min: 10, max: 500 }),
          status: this.random.pick(ORDER_STATUSES),
        })),
        total: this.random.int({ min: 50, max: 499 }),
        timestamp: new Date().toISOString(),
      }),
    });
  }

  @Post('orders')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Create order' })
  @ApiResponse({ status: 200, description: 'Order confirmed' })
  createOrder(@Body() _order: Record<string, unknown>) {
    return this.requests.handle({
      method: 'POST',
      endpoint: '/api/orders',
      delayMs: { min: 200, max: 800 },
      kinds: ['order', 'database', 'activity'],
      respond: () => ({
        orderId: this.random.int({ min: 10000, max: 999998 }),
        total: this.random.amount({ min: 10, max: 500 }),
        status: 'confirmed',
        created: new Date().toISOString(),
      }),
    });
  }

  @Get('products')
  @ApiOperation({ summary: 'List products' })
  @ApiResponse({ status: 200, description: 'Products retrieved' })
  getProducts() {
    return this.requests.handle({
      method: 'GET',
      endpoint: '/api/products',
      delayMs: { min: 30, max: 200 },
      kinds: ['activity', 'database'],
      respond: () => ({
        products: this.random.repeat({ min: 8, max: 19 }, () => ({
          id: this.random.int({ min: 1, max: 999 }),
          price: this.random.amount({ min: 5, max: 200 }),
          inStock: this.random.chance(0.5),
        })),
        total: this.random.int({ min: 200, max: 1999 }),
        timestamp: new Date().toISOString(),
      }),
    });
  }

  @Post('payments')
  @ApiOperation({ summary: 'Process payment' })
  @ApiResponse({ status: 200, description: 'Payment succeeded' })
  @ApiResponse({ status: 402, description: 'Payment declined' })
  async processPayment(@Body() _payment: Record<string, unknown>, @Res() reply: JsonReply) {
    const result = await this.requests.handle({
      method: 'POST',
      endpoint: '/api/payments',
      delayMs: { min: 500, max: 2000 },
      kinds: ['order', 'database', 'activity'],
      respond: () => {
        const success = this.random.chance(PAYMENT_SUCCESS_RATE);
        return {
          success,
          body: {
            paymentId: this.random.int({ min: 100000, max: 9999998 }),
            status: success ? 'success' : 'failed',
            amount: this.random.amount({ min: 10, max: 1000 }),
            processed: new Date().toISOString(),
          },
        };
      },
    });

    return reply.status(result.success ? HttpStatus.OK : HttpStatus.PAYMENT_REQUIRED).json(result.body);
  }
}
