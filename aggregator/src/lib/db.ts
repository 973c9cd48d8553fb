import { Pool } from "pg";
import { CacheBackend } from "./cache";

/** Cache entries in one Postgres table, for deployments without Redis. */
export class PostgresCacheStore implements CacheBackend {
  readonly name = "postgres";
  private readonly pool: Pool;
  private schemaReady: Promise<void> | null = null;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.pool
        .query(
          `
          create table if not exists aggregation_cache (
            key text primary key,
            payload bytea not null,
            expires_at timestamptz not null
          )
          `
        )
        .then(
          () => undefined,
          (error: unknown) => {
            this.schemaReady = null;
            throw error;
          }
        );
    }
    return this.schemaReady;
  }

  async get(key: string): Promise<Buffer | null> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<{ payload: Buffer }>(
      "select payload from aggregation_cache where key = $1 and expires_at > now() limit 1",
      [key]
    );
    return rows[0]?.payload ?? null;
  }

  async set(key: string, value: Buffer, ttlSeconds: number): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(
      `
      insert into aggregation_cache (key, payload, expires_at)
      values ($1, $2, now() + make_interval(secs => $3))
      on conflict (key) do update set
        payload = excluded.payload,
        expires_at = excluded.expires_at
      `,
      [key, value, ttlSeconds]
    );
  }

  async ttl(key: string): Promise<number> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<{ seconds: number }>(
      `
      select greatest(0, ceil(extract(epoch from expires_at - now())))::int as seconds
      from aggregation_cache
      where key = $1 and expires_at > now()
      limit 1
      `,
      [key]
    );
    return rows[0]?.seconds ?? -2;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
