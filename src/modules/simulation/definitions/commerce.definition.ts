import { DomainDefinition } from './domain-definition';

export const COMMERCE_REGIONS = ['us-east-1', 'us-west-2', 'eu-west-1', 'ap-southeast-1', 'ca-central-1'] as const;

export const COMMERCE_ENDPOINTS = ['/api/orders', '/api/payments', '/api/products', '/api/cart'] as const;

export const ORDER_TYPES = ['standard', 'express', 'overnight', 'international', 'subscription'] as const;

export const PAYMENT_METHODS = [
  'credit_card',
  'debit_card',
  'paypal',
  'apple_pay',
  'google_pay',
  'bank_transfer',
  'crypto',
] as const;

export const FULFILLMENT_TYPES = ['warehouse', 'dropship', 'digital', 'pickup'] as const;

export const CURRENCIES = ['USD', 'EUR', 'GBP', 'CAD', 'JPY', 'AUD'] as const;

export const PAYMENT_STATUSES = ['success', 'failed', 'pending', 'cancelled'] as const;

export const PRODUCT_CATEGORIES = ['electronics', 'clothing', 'books', 'home', 'sports', 'automotive', 'beauty'] as const;

export const DEVICES = ['desktop', 'mobile', 'tablet', 'api'] as const;

export const CART_ACTIONS = ['add_item', 'remove_item', 'update_quantity', 'apply_coupon', 'checkout', 'abandon'] as const;

/**
 * Commerce analytics: orders, payments, catalog, cart and the database behind them.
 */
export const commerceDefinition: DomainDefinition = {
  service: 'commerce-analytics',
  defaultPort: 8082,
  instruments: [
    {
      kind: 'counter',
      name: 'commerce_orders_total',
      help: 'Total number of orders',
      labels: { order_type: ORDER_TYPES, payment_method: PAYMENT_METHODS, fulfillment_type: FULFILLMENT_TYPES },
    },
    {
      kind: 'counter',
      name: 'commerce_payments_total',
      help: 'Total number of payments',
      labels: { payment_method: PAYMENT_METHODS, currency: CURRENCIES, status: PAYMENT_STATUSES },
    },
    {
      kind: 'counter',
      name: 'commerce_products_views_total',
      help: 'Total number of product views',
      labels: { category: PRODUCT_CATEGORIES, device: DEVICES },
    },
    {
      kind: 'counter',
      name: 'commerce_cart_actions_total',
      help: 'Total number of cart actions',
      labels: { action: CART_ACTIONS, device: DEVICES },
    },
    {
      kind: 'counter',
      name: 'commerce_requests_by_region_total',
      help: 'Commerce requests by region',
      labels: { region: COMMERCE_REGIONS },
    },
    { kind: 'gauge', name: 'commerce_inventory_levels', help: 'Current inventory levels', initial: 1000, min: 0, max: 5000 },
    { kind: 'gauge', name: 'commerce_orders_active', help: 'Number of currently active orders', initial: 0, min: 0, max: 100 },
    {
      kind: 'gauge',
      name: 'commerce_revenue_total_cents',
      help: 'Total revenue in cents',
      initial: 0,
      min: 0,
      max: Number.MAX_SAFE_INTEGER,
    },
    {
      kind: 'gauge',
      name: 'commerce_database_connections_active',
      help: 'Number of active database connections',
      initial: 10,
      min: 1,
      max: 50,
    },
    { kind: 'timer', name: 'commerce_order_processing_duration_seconds', help: 'Order processing time' },
    { kind: 'timer', name: 'commerce_payment_processing_duration_seconds', help: 'Payment processing time' },
    { kind: 'timer', name: 'commerce_inventory_check_duration_seconds', help: 'Inventory check processing time' },
    { kind: 'timer', name: 'commerce_database_query_duration_seconds', help: 'Database query execution time' },
    {
      kind: 'timer',
      name: 'commerce_endpoint_duration_seconds',
      help: 'Commerce endpoint processing time',
      labels: { endpoint: COMMERCE_ENDPOINTS },
    },
    { kind: 'summary', name: 'commerce_order_value_dollars', help: 'Distribution of order values' },
    { kind: 'summary', name: 'commerce_shipping_cost_dollars', help: 'Distribution of shipping costs' },
    { kind: 'summary', name: 'commerce_product_rating', help: 'Distribution of product ratings' },
  ],
  regions: { counter: 'commerce_requests_by_region_total', values: COMMERCE_REGIONS },
  endpoints: { timer: 'commerce_endpoint_duration_seconds', values: COMMERCE_ENDPOINTS },
  activities: {
    order: [
      { type: 'increment', counter: 'commerce_orders_total' },
      { type: 'observe', summary: 'commerce_order_value_dollars', range: { min: 10, max: 500 }, store: 'orderValue' },
      { type: 'accumulate', gauge: 'commerce_revenue_total_cents', from: 'orderValue', scale: 100 },
      { type: 'observe', summary: 'commerce_shipping_cost_dollars', range: { min: 0, max: 25 } },
      { type: 'time', timer: 'commerce_order_processing_duration_seconds', range: { min: 200, max: 2999 } },
      { type: 'delta', gauge: 'commerce_orders_active', range: { min: -2, max: 4 } },
    ],
    payment: [
      { type: 'increment', counter: 'commerce_payments_total' },
      { type: 'time', timer: 'commerce_payment_processing_duration_seconds', range: { min: 300, max: 2499 } },
    ],
    product: [
      { type: 'increment', counter: 'commerce_products_views_total' },
      { type: 'observe', summary: 'commerce_product_rating', range: { min: 1, max: 5 } },
      { type: 'delta', gauge: 'commerce_inventory_levels', range: { min: -10, max: 4 } },
      { type: 'time', timer: 'commerce_inventory_check_duration_seconds', range: { min: 25, max: 199 } },
    ],
    cart: [{ type: 'increment', counter: 'commerce_cart_actions_total' }],
    database: [
      { type: 'time', timer: 'commerce_database_query_duration_seconds', range: { min: 10, max: 799 } },
      { type: 'delta', gauge: 'commerce_database_connections_active', range: { min: -2, max: 2 } },
    ],
    region: [{ type: 'region' }],
    endpoint: [{ type: 'endpoint', range: { min: 100, max: 1499 } }],
  },
  schedule: {
    jobs: [
      { kind: 'order', periodMs: 12_000, repetitions: { min: 1, max: 4 } },
      { kind: 'payment', periodMs: 8_000, repetitions: { min: 1, max: 3 } },
      { kind: 'product', periodMs: 5_000, repetitions: { min: 2, max: 8 } },
      { kind: 'cart', periodMs: 7_000, repetitions: { min: 1, max: 5 } },
      { kind: 'database', periodMs: 4_000, repetitions: { min: 2, max: 6 } },
      { kind: 'region', periodMs: 9_000, repetitions: { min: 3, max: 9 } },
      { kind: 'endpoint', periodMs: 6_000, repetitions: { min: 2, max: 6 } },
    ],
    sweepPeriodMs: 60_000,
    // Sales event
    burst: {
      periodMs: 180_000,
      repetitions: { min: 20, max: 49 },
      pauseMs: { min: 5, max: 29 },
      split: [
        { below: 0.25, kind: 'order' },
        { below: 0.45, kind: 'payment' },
        { below: 0.7, kind: 'product' },
        { below: 0.85, kind: 'cart' },
      ],
      fallback: 'endpoint',
    },
  },
  healthActivity: 'product',
  commands: {
    orders: { kinds: ['order'], message: 'Order processing simulated' },
    payments: { kinds: ['payment'], message: 'Payment processing simulated' },
    products: { kinds: ['product'], message: 'Product activity simulated' },
    cart: { kinds: ['cart'], message: 'Cart activity simulated' },
    database: { kinds: ['database'], message: 'Database activity simulated' },
    regions: { kinds: ['region'], message: 'Regional commerce activity simulated' },
    endpoints: { kinds: ['endpoint'], message: 'Commerce endpoint activity simulated' },
    all: { kinds: [], message: 'All commerce activities simulated' },
  },
};
