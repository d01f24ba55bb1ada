// Re-export all schema tables
export * from './roster.js';
export * from './activatables.js';
export * from './periods.js';
export * from './championships.js';
export * from './memberships.js';
