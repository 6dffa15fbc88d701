import { Pool } from "pg";
import { PersistenceError } from "../errors";
import type { BucketId, BucketSnapshot } from "../types";
import type { BucketRepository } from "./inMemoryRepository";
import { parseBucketSnapshot } from "./snapshot";

export interface PostgresBucketRepositoryOptions {
  connectionString: string;
  schema?: string;
  statementTimeoutMs?: number;
}

type BucketRow = {
  id: string;
  extension_period: number;
  extension_unlock_window: number;
  balance: string;
  slots: Record<string, string | null>;
  capability_id: string;
};

const quoteIdentifier = (value: string) => `"${value.replace(/"/g, '""')}"`;

export const sqlMigrations = (schema = "larder") => {
  const s = quoteIdentifier(schema);
  return `
create schema if not exists ${s};
create table if not exists ${s}.buckets (
  id text primary key,
  extension_period integer not null check (extension_period > 0),
  extension_unlock_window integer not null check (extension_unlock_window >= 0),
  balance numeric(78, 0) not null check (balance >= 0),
  slots jsonb not null default '{}'::jsonb,
  updated_at timestamptz not null default now()
);
create table if not exists ${s}.admin_capabilities (
  id text primary key,
  bound_bucket text not null unique references ${s}.buckets (id) on delete cascade
);
`;
};

export const SQL_MIGRATIONS = sqlMigrations();

export const createPostgresBucketRepository = (options: PostgresBucketRepositoryOptions): BucketRepository => {
  const schema = quoteIdentifier(options.schema ?? "larder");
  const pool = new Pool({
    connectionString: options.connectionString,
    statement_timeout: options.statementTimeoutMs ?? 5_000,
  });

  const fail = (op: string, bucketId: BucketId, error: unknown): never => {
    throw new PersistenceError(`Postgres ${op} failed`, { bucketId }, error);
  };

  return {
    async save(snapshot: BucketSnapshot): Promise<void> {
      const { bucket, capability } = snapshot;
      const client = await pool.connect();
      try {
        await client.query("begin");
        await client.query(
          `insert into ${schema}.buckets (id, extension_period, extension_unlock_window, balance, slots)
           values ($1, $2, $3, $4, $5)
           on conflict (id) do update
              set balance = excluded.balance,
                  slots = excluded.slots,
                  updated_at = now()`,
          [bucket.id, bucket.extensionPeriod, bucket.extensionUnlockWindow, bucket.balance, JSON.stringify(bucket.slots)]
        );
        await client.query(
          `insert into ${schema}.admin_capabilities (id, bound_bucket)
           values ($1, $2)
           on conflict (id) do nothing`,
          [capability.id, capability.boundBucket]
        );
        await client.query("commit");
      } catch (error) {
        await client.query("rollback");
        fail("save", bucket.id, error);
      } finally {
        client.release();
      }
    },

    async load(bucketId: BucketId): Promise<BucketSnapshot | null> {
      let rows: BucketRow[];
      try {
        ({ rows } = await pool.query<BucketRow>(
          `select b.id, b.extension_period, b.extension_unlock_window, b.balance::text as balance, b.slots,
                  c.id as capability_id
             from ${schema}.buckets b
             join ${schema}.admin_capabilities c on c.bound_bucket = b.id
            where b.id = $1`,
          [bucketId]
        ));
      } catch (error) {
        return fail("load", bucketId, error);
      }
      const row = rows[0];
      if (!row) return null;
      return parseBucketSnapshot({
        bucket: {
          id: row.id,
          extensionPeriod: Number(row.extension_period),
          extensionUnlockWindow: Number(row.extension_unlock_window),
          balance: row.balance,
          slots: row.slots,
        },
        capability: { id: row.capability_id, boundBucket: row.id },
      });
    },

    async delete(bucketId: BucketId): Promise<void> {
      try {
        await pool.query(`delete from ${schema}.buckets where id = $1`, [bucketId]);
      } catch (error) {
        fail("delete", bucketId, error);
      }
    },
  };
};

export const runMigrations = async (connectionString: string, schema?: string) => {
  const pool = new Pool({ connectionString });
  try {
    await pool.query(sqlMigrations(schema));
  } finally {
    await pool.end();
  }
};
