// Re-export all protocol types

export * from './common.js';
export * from './refs.js';
export * from './statuses.js';
export * from './periods.js';
export * from './roster.js';
export * from './titles.js';
export * from './stables.js';
export * from './memberships.js';
export * from './transitions.js';
