import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export type Database = PostgresJsDatabase<typeof schema>;

let connection: postgres.Sql | null = null;
let database: Database | null = null;

/**
 * Initialize the database client
 */
export function initializeDatabase(connectionString: string): Database {
  if (database) {
    return database;
  }

  connection = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: {
      application_name: 'auth-core',
    },
  });
  database = drizzle(connection, { schema });

  return database;
}

/**
 * Get the current database client
 * Throws if not initialized
 */
export function getDatabase(): Database {
  if (!database) {
    throw new Error('Database not initialized; call initializeDatabase() first');
  }
  return database;
}

/**
 * Close the database connection
 */
export async function closeDatabase(): Promise<void> {
  if (connection) {
    await connection.end();
    connection = null;
    database = null;
  }
}

/**
 * PostgreSQL unique_violation (23505): returns the violated constraint name
 */
export function uniqueViolationConstraint(error: unknown): string | undefined {
  let current: unknown = error;
  while (current instanceof Error) {
    if ('code' in current && current.code === '23505') {
      const constraint = 'constraint_name' in current ? current.constraint_name : undefined;
      return typeof constraint === 'string' ? constraint : '';
    }
    current = current.cause;
  }
  return undefined;
}
