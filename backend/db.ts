import { Pool } from 'pg';

import type { AppConfig } from './config';
import { documentRowSchema, type DocumentRow } from './schema';

/*
  Document-style access on top of PostgreSQL.
  Every collection lives in a single table:

    CREATE TABLE documents (
      collection TEXT NOT NULL,
      id TEXT NOT NULL,
      data JSONB NOT NULL,
      PRIMARY KEY (collection, id)
    );
*/

export type Document = DocumentRow;

export interface DocumentStore {
  findWhere(collection: string, field: string, value: string): Promise<Document[]>;
  update(collection: string, id: string, patch: Record<string, unknown>): Promise<void>;
  ping(): Promise<void>;
}

// The subset of pg.Pool the store needs
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export function createPool(config: AppConfig): Pool {
  return new Pool(
    config.DATABASE_URL
      ? {
          connectionString: config.DATABASE_URL,
          ssl: config.PGSSL,
        }
      : {
          host: config.PGHOST,
          database: config.PGDATABASE,
          user: config.PGUSER,
          password: config.PGPASSWORD,
          port: config.PGPORT,
          ssl: config.PGSSL,
        }
  );
}

export class PgDocumentStore implements DocumentStore {
  constructor(private readonly pool: Queryable) {}

  async findWhere(collection: string, field: string, value: string): Promise<Document[]> {
    const result = await this.pool.query(
      'SELECT id, data FROM documents WHERE collection = $1 AND data->>$2 = $3',
      [collection, field, value]
    );

    return result.rows.map((row) => documentRowSchema.parse(row));
  }

  async update(collection: string, id: string, patch: Record<string, unknown>): Promise<void> {
    await this.pool.query(
      'UPDATE documents SET data = data || $3::jsonb WHERE collection = $1 AND id = $2',
      [collection, id, JSON.stringify(patch)]
    );
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
