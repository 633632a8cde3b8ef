export interface EnvConfig {
  PORT: number;
  ALLOWED_ORIGINS: string;
  KEEP_ALIVE_MS: number;
  CONNECTION_INIT_TIMEOUT_MS: number;
  TEARDOWN_TIMEOUT_MS: number;
}

/** Non-negative integer setting; anything else falls back to `fallback`. */
export function parseMillis(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export default (): EnvConfig => ({
  PORT: parseInt(process.env.PORT ?? '3000', 10),
  ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS ?? 'http://localhost:3000',
  KEEP_ALIVE_MS: parseMillis(process.env.KEEP_ALIVE_MS, 10_000),
  CONNECTION_INIT_TIMEOUT_MS: parseMillis(process.env.CONNECTION_INIT_TIMEOUT_MS, 10_000),
  TEARDOWN_TIMEOUT_MS: parseMillis(process.env.TEARDOWN_TIMEOUT_MS, 5_000),
});

/** Parse the comma-separated `ALLOWED_ORIGINS` setting. */
export function parseAllowedOrigins(value: string): string[] {
  return value
    .split(',')
    .map((o) => o.trim().replace(/\/+$/, ''))
    .filter((o) => o.length > 0);
}
