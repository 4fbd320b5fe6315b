// eligibility-core: pure scheme eligibility engine.
// No HTTP, no logging, no side effects beyond reading rule-set files.

export const ELIGIBILITY_CORE_VERSION = '0.1.0';

export * from './applicant';
export * from './conditional-requirements';
export * from './decision';
export * from './errors';
export * from './exclusions';
export * from './explain';
export * from './family';
export * from './predicates';
export * from './registry';
export * from './requirements';
export * from './rule-set';
export * from './special-provisions';
