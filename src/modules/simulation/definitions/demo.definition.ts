import { DomainDefinition } from './domain-definition';

export const DEMO_REGIONS = ['us-east-1', 'us-west-2', 'eu-west-1', 'ap-southeast-1'] as const;

export const DEMO_ENDPOINTS = ['/api/users', '/api/orders', '/api/products', '/api/payments'] as const;

const MEBIBYTE = 1024 * 1024;

/**
 * Single-module demo mixing user and order signals under the `app_` prefix.
 * The user activity job period follows METRICS_SIMULATION_INTERVAL_SECONDS.
 */
export const demoDefinition: DomainDefinition = {
  service: 'metrics-demo',
  defaultPort: 8080,
  instruments: [
    { kind: 'counter', name: 'app_requests_total', help: 'Total number of requests' },
    {
      kind: 'counter',
      name: 'app_errors_total',
      help: 'Total number of errors',
      labels: {
        error_type: ['validation', 'authentication', 'authorization', 'database', 'network', 'timeout'],
        status_code: ['400', '401', '403', '404', '500', '502', '503'],
      },
    },
    {
      kind: 'counter',
      name: 'app_orders_total',
      help: 'Total number of orders',
      labels: {
        order_type: ['standard', 'express', 'overnight', 'international'],
        payment_method: ['credit_card', 'debit_card', 'paypal', 'apple_pay', 'google_pay', 'bank_transfer'],
      },
    },
    {
      kind: 'counter',
      name: 'app_users_registrations_total',
      help: 'Total number of user registrations',
      labels: {
        source: ['web', 'mobile_app', 'social_login', 'referral'],
        user_type: ['free', 'premium', 'enterprise'],
      },
    },
    { kind: 'counter', name: 'app_requests_by_region_total', help: 'Requests by region', labels: { region: DEMO_REGIONS } },
    { kind: 'gauge', name: 'app_users_active', help: 'Number of currently active users', initial: 0, min: 0, max: 200 },
    { kind: 'gauge', name: 'app_queue_size', help: 'Current queue size', initial: 0, min: 0, max: 50 },
    {
      kind: 'gauge',
      name: 'app_memory_usage_bytes',
      help: 'Current memory usage in bytes',
      initial: 0,
      min: 0,
      max: Number.MAX_SAFE_INTEGER,
    },
    {
      kind: 'gauge',
      name: 'app_database_connections_active',
      help: 'Number of active database connections',
      initial: 10,
      min: 1,
      max: 50,
    },
    { kind: 'timer', name: 'app_request_duration_seconds', help: 'Request processing time' },
    { kind: 'timer', name: 'app_database_query_duration_seconds', help: 'Database query execution time' },
    { kind: 'timer', name: 'app_payment_processing_duration_seconds', help: 'Payment processing time' },
    {
      kind: 'timer',
      name: 'app_endpoint_duration_seconds',
      help: 'Endpoint processing time',
      labels: { endpoint: DEMO_ENDPOINTS },
    },
    { kind: 'summary', name: 'app_order_value_dollars', help: 'Distribution of order values' },
    { kind: 'summary', name: 'app_message_size_bytes', help: 'Distribution of message sizes' },
  ],
  regions: { counter: 'app_requests_by_region_total', values: DEMO_REGIONS },
  endpoints: {
    timer: 'app_endpoint_duration_seconds',
    values: DEMO_ENDPOINTS,
    requestTimer: 'app_request_duration_seconds',
  },
  activities: {
    activity: [
      { type: 'increment', counter: 'app_requests_total' },
      { type: 'chanceIncrement', counter: 'app_errors_total', probability: 0.05 },
      { type: 'delta', gauge: 'app_users_active', range: { min: -5, max: 5 } },
      { type: 'set', gauge: 'app_queue_size', range: { min: 0, max: 49 } },
      { type: 'set', gauge: 'app_memory_usage_bytes', range: { min: 100, max: 999 }, scale: MEBIBYTE },
      { type: 'set', gauge: 'app_database_connections_active', range: { min: 5, max: 19 } },
    ],
    order: [
      { type: 'increment', counter: 'app_orders_total' },
      { type: 'observe', summary: 'app_order_value_dollars', range: { min: 10, max: 500 } },
      { type: 'time', timer: 'app_payment_processing_duration_seconds', range: { min: 100, max: 1999 } },
    ],
    database: [
      { type: 'time', timer: 'app_database_query_duration_seconds', range: { min: 5, max: 499 } },
      { type: 'observe', summary: 'app_message_size_bytes', range: { min: 100, max: 9999 }, integer: true },
    ],
    region: [{ type: 'region' }],
    endpoint: [{ type: 'endpoint', range: { min: 50, max: 999 } }],
    registration: [{ type: 'increment', counter: 'app_users_registrations_total' }],
  },
  schedule: {
    jobs: [
      { kind: 'activity', periodMs: 5_000, repetitions: { min: 1, max: 4 }, configurablePeriod: true },
      { kind: 'order', periodMs: 10_000, repetitions: { min: 1, max: 3 } },
      { kind: 'database', periodMs: 3_000, repetitions: { min: 2, max: 6 } },
      { kind: 'region', periodMs: 7_000, repetitions: { min: 3, max: 7 } },
      { kind: 'endpoint', periodMs: 8_000, repetitions: { min: 2, max: 5 } },
      { kind: 'registration', periodMs: 30_000, repetitions: { min: 0, max: 3 } },
    ],
    sweepPeriodMs: 60_000,
    burst: {
      periodMs: 120_000,
      repetitions: { min: 10, max: 24 },
      pauseMs: { min: 10, max: 49 },
      split: [
        { below: 0.3, kind: 'activity' },
        { below: 0.5, kind: 'order' },
        { below: 0.7, kind: 'database' },
        { below: 0.85, kind: 'region' },
      ],
      fallback: 'endpoint',
    },
  },
  healthActivity: 'activity',
  commands: {
    users: { kinds: ['activity'], message: 'User activity simulated' },
    orders: { kinds: ['order'], message: 'Order processing simulated' },
    database: { kinds: ['database'], message: 'Database activity simulated' },
    regions: { kinds: ['region'], message: 'Regional activity simulated' },
    endpoints: { kinds: ['endpoint'], message: 'Endpoint activity simulated' },
    all: { kinds: ['activity', 'order', 'database', 'region', 'endpoint'], message: 'All activities simulated' },
  },
};
