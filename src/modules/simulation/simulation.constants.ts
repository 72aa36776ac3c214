/** Injection token for the active DomainDefinition */
export const DOMAIN_DEFINITION = Symbol('DOMAIN_DEFINITION');

/** SchedulerRegistry names are prefixed with this */
export const SIMULATION_JOB_PREFIX = 'simulation';
