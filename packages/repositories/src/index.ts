// @roster/repositories
// Repository interfaces and implementations for storage-independent data access.
//
// This package defines the "contract" for data operations. The implementations
// (Postgres, in-memory) fulfill these contracts, allowing the runtime to work
// with any storage backend.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - Every transition runs inside TransactionalRepositoryContext.transaction()

export * from './interfaces/index.js';
export * as postgres from './postgres/index.js';
export * as memory from './in-memory/index.js';
export { createInMemoryRepositoryContext } from './in-memory/index.js';
export type { InMemoryRepositoryContext, InMemoryDataStore } from './in-memory/index.js';
