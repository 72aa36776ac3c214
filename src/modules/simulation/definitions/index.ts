import { commerceDefinition } from './commerce.definition';
import { demoDefinition } from './demo.definition';
import { DomainDefinition } from './domain-definition';
import { userDefinition } from './user.definition';

export * from './domain-definition';
export { commerceDefinition } from './commerce.definition';
export { demoDefinition } from './demo.definition';
export { userDefinition } from './user.definition';

export const ANALYTICS_DOMAINS = ['user', 'commerce', 'demo'] as const;

export type AnalyticsDomain = (typeof ANALYTICS_DOMAINS)[number];

export const DOMAIN_DEFINITIONS: Readonly<Record<AnalyticsDomain, DomainDefinition>> = {
  user: userDefinition,
  commerce: commerceDefinition,
  demo: demoDefinition,
};

export function isAnalyticsDomain(value: string): value is AnalyticsDomain {
  return Object.prototype.hasOwnProperty.call(DOMAIN_DEFINITIONS, value);
}

/**
 * Reads an ANALYTICS_DOMAIN value; absent means demo
 * @throws Error naming the accepted domains when the value is unknown
 */
export function parseDomain(value: string | undefined): AnalyticsDomain {
  const domain = (value || 'demo').trim().toLowerCase();
  if (!isAnalyticsDomain(domain)) {
    throw new Error(`Unknown analytics domain "${value}", expected one of: ${ANALYTICS_DOMAINS.join(', ')}`);
  }
  return domain;
}
