import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query, Res } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JsonReply } from '../../common/http/json-reply';
import { RandomService } from '../../common/random/random.service';
import { CART_ACTIONS, FULFILLMENT_TYPES, PRODUCT_CATEGORIES } from '../simulation/definitions/commerce.definition';
import { RequestSimulator } from '../simulation/request.simulator';

export const ORDER_STATUSES = ['pending', 'processing', 'shipped', 'delivered', 'cancelled'] as const;

/** Share of payments answered with 200; the rest get 402 */
export const PAYMENT_SUCCESS_RATE = 0.9;

/**
 * Commerce analytics REST endpoints.
 *
 * @remarks
 * Each handler waits a random processing delay, runs its activities through
 * the metrics engine and records its own wall time under its path. Bodies
 * carry random ids and amounts only.
 */
@ApiTags('commerce')
@Controller('api')
export class CommerceController {
  constructor(
    private readonly requests: RequestSimulator,
    private readonly random: RandomService,
  ) {}

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
          fulfillmentType: this.random.pick(FULFILLMENT_TYPES),
        })),
        total: this.random.int({ min: 50, max: 499 }),
        timestamp: new Date().toISOString(),
      }),
    });
  }

  /** Accepts any body; its content is not used */
  @Post('orders')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Create order' })
  @ApiResponse({ status: 200, description: 'Order confirmed' })
  createOrder(@Body() _order: Record<string, unknown>) {
    return this.requests.handle({
      method: 'POST',
      endpoint: '/api/orders',
      delayMs: { min: 200, max: 800 },
      kinds: ['order', 'database', 'product'],
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
      kinds: ['product', 'database'],
      respond: () => ({
        products: this.random.repeat({ min: 8, max: 19 }, () => ({
          id: this.random.int({ min: 1, max: 999 }),
          price: this.random.amount({ min: 5, max: 200 }),
          category: this.random.pick(PRODUCT_CATEGORIES),
          inStock: this.random.chance(0.5),
          rating: this.random.amount({ min: 1, max: 5 }),
        })),
        total: this.random.int({ min: 200, max: 1999 }),
        timestamp: new Date().toISOString(),
      }),
    });
  }

  /**
   * Processes a payment; about one in ten is declined with 402.
   * The decline is drawn independently of the payment counter's status label.
   */
  @Post('payments')
  @ApiOperation({ summary: 'Process payment' })
  @ApiResponse({ status: 200, description: 'Payment succeeded' })
  @ApiResponse({ status: 402, description: 'Payment declined' })
  async processPayment(@Body() _payment: Record<string, unknown>, @Res() reply: JsonReply) {
    const result = await this.requests.handle({
      method: 'POST',
      endpoint: '/api/payments',
      delayMs: { min: 500, max: 2000 },
      kinds: ['payment', 'order', 'database'],
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

  @Get('cart')
  @ApiOperation({ summary: 'Get cart' })
  @ApiQuery({ name: 'userId', required: false, description: 'Defaults to 1' })
  @ApiResponse({ status: 200, description: 'Cart retrieved' })
  getCart(@Query('userId') userId?: string) {
    return this.requests.handle({
      method: 'GET',
      endpoint: '/api/cart',
      delayMs: { min: 50, max: 250 },
      kinds: ['cart', 'product'],
      respond: () => ({
        userId: userId ?? '1',
        items: this.random.repeat({ min: 1, max: 5 }, () => ({
          productId: this.random.int({ min: 1, max: 999 }),
          price: this.random.amount({ min: 5, max: 100 }),
          quantity: this.random.int({ min: 1, max: 4 }),
        })),
        totalValue: this.random.amount({ min: 25, max: 300 }),
        itemCount: this.random.int({ min: 1, max: 7 }),
        timestamp: new Date().toISOString(),
      }),
    });
  }

  @Post('cart')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Update cart' })
  @ApiResponse({ status: 200, description: 'Cart updated' })
  updateCart(@Body() _update: Record<string, unknown>) {
    return this.requests.handle({
      method: 'POST',
      endpoint: '/api/cart',
      delayMs: { min: 75, max: 300 },
      kinds: ['cart', 'product', 'database'],
      respond: () => ({
        cartId: this.random.int({ min: 10000, max: 99998 }),
        action: this.random.pick(CART_ACTIONS),
        totalValue: this.random.amount({ min: 25, max: 300 }),
        updated: new Date().toISOString(),
      }),
    });
  }
}
