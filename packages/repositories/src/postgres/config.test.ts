import { describe, it, expect } from 'vitest';
import { loadDatabaseConfig } from './config.js';

describe('loadDatabaseConfig', () => {
  it('reads the connection string and defaults the pool size', () => {
    const config = loadDatabaseConfig({ DATABASE_URL: 'postgres://localhost:5432/roster' });

    expect(config).toEqual({
      connectionString: 'postgres://localhost:5432/roster',
      maxConnections: 10,
    });
  });

  it('coerces DATABASE_MAX_CONNECTIONS to a number', () => {
    const config = loadDatabaseConfig({
      DATABASE_URL: 'postgres://localhost:5432/roster',
      DATABASE_MAX_CONNECTIONS: '25',
    });

    expect(config.maxConnections).toBe(25);
  });

  it('rejects a missing DATABASE_URL', () => {
    expect(() => loadDatabaseConfig({})).toThrow(
      'Invalid database configuration: DATABASE_URL is required'
    );
  });

  it('rejects a value that is not a URL', () => {
    expect(() => loadDatabaseConfig({ DATABASE_URL: 'not a url' })).toThrow(
      'Invalid database configuration: DATABASE_URL must be a connection URL'
    );
  });

  it('rejects a non-positive pool size', () => {
    expect(() =>
      loadDatabaseConfig({
        DATABASE_URL: 'postgres://localhost:5432/roster',
        DATABASE_MAX_CONNECTIONS: '0',
      })
    ).toThrow('DATABASE_MAX_CONNECTIONS must be positive');
  });

  it('ignores unrelated variables', () => {
    const config = loadDatabaseConfig({
      DATABASE_URL: 'postgres://localhost:5432/roster',
      HOME: '/home/test',
    });

    expect(config.maxConnections).toBe(10);
  });
});
