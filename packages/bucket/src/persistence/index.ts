import type { Config } from "@larder/config";
import { ValidationFailedError } from "../errors";
import { createInMemoryBucketRepository, type BucketRepository } from "./inMemoryRepository";
import { createPostgresBucketRepository } from "./postgresRepository";

export type { BucketRepository } from "./inMemoryRepository";
export { createInMemoryBucketRepository } from "./inMemoryRepository";
export { createPostgresBucketRepository, runMigrations, sqlMigrations, SQL_MIGRATIONS } from "./postgresRepository";
export { parseBucketSnapshot, restoreBucket, type RestoreOptions } from "./snapshot";

export function createBucketRepository(config: Config): BucketRepository {
  if (config.STORAGE_DRIVER === "memory") {
    return createInMemoryBucketRepository();
  }
  if (!config.POSTGRES_URL) {
    throw new ValidationFailedError("POSTGRES_URL is required for postgres storage");
  }
  return createPostgresBucketRepository({
    connectionString: config.POSTGRES_URL,
    schema: config.POSTGRES_SCHEMA,
  });
}
