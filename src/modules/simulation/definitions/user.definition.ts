import { DomainDefinition } from './domain-definition';

export const USER_REGIONS = ['us-east-1', 'us-west-2', 'eu-west-1', 'ap-southeast-1', 'ap-northeast-1'] as const;

export const USER_ENDPOINTS = ['/api/users', '/api/users/profile', '/api/users/auth', '/api/users/sessions'] as const;

export const REGISTRATION_SOURCES = ['web', 'mobile_app', 'social_login', 'referral', 'api', 'admin'] as const;

export const USER_TYPES = ['free', 'premium', 'enterprise', 'trial'] as const;

export const AUTH_METHODS = ['password', 'oauth', 'sso', '2fa', 'biometric'] as const;

export const USER_DEVICES = ['desktop', 'mobile', 'tablet', 'api'] as const;

/**
 * User analytics: engagement, registrations, logins and sessions.
 *
 * Online users never drop below active users: the online delta is clamped
 * with the freshly stored active count as its floor.
 */
export const userDefinition: DomainDefinition = {
  service: 'user-analytics',
  defaultPort: 8081,
  instruments: [
    {
      kind: 'counter',
      name: 'user_registrations_total',
      help: 'Total number of user registrations',
      labels: { source: REGISTRATION_SOURCES, user_type: USER_TYPES, device: USER_DEVICES },
    },
    {
      kind: 'counter',
      name: 'user_logins_total',
      help: 'Total number of user logins',
      labels: { auth_method: AUTH_METHODS, device: USER_DEVICES, success: ['true', 'false'] },
    },
    { kind: 'counter', name: 'user_sessions_total', help: 'Total number of user sessions' },
    { kind: 'counter', name: 'user_engagement_total', help: 'Total user engagement events' },
    {
      kind: 'counter',
      name: 'user_requests_by_region_total',
      help: 'User requests by region',
      labels: { region: USER_REGIONS },
    },
    { kind: 'gauge', name: 'user_active_count', help: 'Number of currently active users', initial: 0, min: 0, max: 150 },
    { kind: 'gauge', name: 'user_online_count', help: 'Number of currently online users', initial: 0, min: 0, max: 200 },
    {
      kind: 'gauge',
      name: 'user_session_duration_total_seconds',
      help: 'Total session duration in seconds',
      initial: 0,
      min: 0,
      max: Number.MAX_SAFE_INTEGER,
    },
    { kind: 'gauge', name: 'user_cache_size', help: 'Number of users in cache', initial: 0, min: 0, max: 500 },
    { kind: 'timer', name: 'user_request_duration_seconds', help: 'User request processing time' },
    { kind: 'timer', name: 'user_auth_duration_seconds', help: 'User authentication processing time' },
    { kind: 'timer', name: 'user_profile_load_duration_seconds', help: 'User profile loading time' },
    {
      kind: 'timer',
      name: 'user_endpoint_duration_seconds',
      help: 'User endpoint processing time',
      labels: { endpoint: USER_ENDPOINTS },
    },
    { kind: 'summary', name: 'user_session_duration_seconds', help: 'Distribution of user session durations' },
    { kind: 'summary', name: 'user_activity_score', help: 'Distribution of user activity scores' },
  ],
  regions: { counter: 'user_requests_by_region_total', values: USER_REGIONS },
  endpoints: {
    timer: 'user_endpoint_duration_seconds',
    values: USER_ENDPOINTS,
    requestTimer: 'user_request_duration_seconds',
  },
  activities: {
    activity: [
      { type: 'delta', gauge: 'user_active_count', range: { min: -3, max: 7 } },
      { type: 'delta', gauge: 'user_online_count', range: { min: -2, max: 9 }, floorGauge: 'user_active_count' },
      { type: 'set', gauge: 'user_cache_size', range: { min: 50, max: 499 } },
      { type: 'increment', counter: 'user_engagement_total' },
      { type: 'observe', summary: 'user_activity_score', range: { min: 1, max: 10 } },
    ],
    registration: [{ type: 'increment', counter: 'user_registrations_total' }],
    login: [
      { type: 'increment', counter: 'user_logins_total' },
      { type: 'time', timer: 'user_auth_duration_seconds', range: { min: 100, max: 1499 } },
    ],
    session: [
      { type: 'increment', counter: 'user_sessions_total' },
      {
        type: 'observe',
        summary: 'user_session_duration_seconds',
        range: { min: 60, max: 3599 },
        integer: true,
        store: 'sessionSeconds',
      },
      { type: 'accumulate', gauge: 'user_session_duration_total_seconds', from: 'sessionSeconds', scale: 1 },
    ],
    region: [{ type: 'region' }],
    endpoint: [{ type: 'endpoint', range: { min: 25, max: 799 } }],
  },
  schedule: {
    jobs: [
      { kind: 'activity', periodMs: 4_000, repetitions: { min: 2, max: 5 } },
      { kind: 'registration', periodMs: 25_000, repetitions: { min: 0, max: 4 } },
      { kind: 'login', periodMs: 15_000, repetitions: { min: 1, max: 5 } },
      { kind: 'session', periodMs: 20_000, repetitions: { min: 1, max: 3 } },
      { kind: 'region', periodMs: 8_000, repetitions: { min: 2, max: 7 } },
      { kind: 'endpoint', periodMs: 6_000, repetitions: { min: 1, max: 4 } },
    ],
    sweepPeriodMs: 60_000,
    burst: {
      periodMs: 150_000,
      repetitions: { min: 15, max: 34 },
      pauseMs: { min: 10, max: 49 },
      split: [
        { below: 0.3, kind: 'activity' },
        { below: 0.5, kind: 'login' },
        { below: 0.7, kind: 'session' },
        { below: 0.85, kind: 'region' },
      ],
      fallback: 'endpoint',
    },
  },
  healthActivity: 'activity',
  commands: {
    users: { kinds: ['activity'], message: 'User activity simulated' },
    registrations: { kinds: ['registration'], message: 'User registration simulated' },
    logins: { kinds: ['login'], message: 'User login simulated' },
    sessions: { kinds: ['session'], message: 'User session simulated' },
    regions: { kinds: ['region'], message: 'Regional user activity simulated' },
    endpoints: { kinds: ['endpoint'], message: 'User endpoint activity simulated' },
    all: { kinds: [], message: 'All user activities simulated' },
  },
};
