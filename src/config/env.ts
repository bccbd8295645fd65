import { ConfigurationError } from '../errors';

// The only table the postgres entity maps.
export const ARTICLES_TABLE = 'articles';

export type ArticlesBackend = 'supabase' | 'postgres';

export interface SupabaseConfig {
    url: string;
    key: string;
}

export interface PostgresConfig {
    host: string;
    port: number;
    username: string;
    password: string;
    database: string;
}

export interface AppConfig {
    port: number;
    backend: ArticlesBackend;
    table: string;
    supabase?: SupabaseConfig;
    postgres?: PostgresConfig;
    cacheTtlMs: number;
    fetchTimeoutMs: number;
    refreshIntervalMs: number;
}

type Env = Record<string, string | undefined>;

function readSeconds(env: Env, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback * 1000;
    }
    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigurationError(`${name} must be a non-negative number of seconds, got "${raw}"`);
    }
    return value * 1000;
}

function requireVariables(env: Env, names: string[]): void {
    const missing = names.filter((name) => !env[name]?.trim());
    if (missing.length > 0) {
        throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
    }
}

function readSupabase(env: Env): SupabaseConfig {
    requireVariables(env, ['SUPABASE_URL', 'SUPABASE_KEY']);
    const url = env.SUPABASE_URL?.trim() ?? '';
    const key = env.SUPABASE_KEY?.trim() ?? '';
    return { url: url.replace(/\/+$/, ''), key };
}

function readPostgres(env: Env, table: string): PostgresConfig {
    if (table !== ARTICLES_TABLE) {
        throw new ConfigurationError(
            `ARTICLES_TABLE must be "${ARTICLES_TABLE}" for the postgres backend, got "${table}"`
        );
    }
    requireVariables(env, ['DB_HOST', 'DB_USER', 'DB_PASSWORD']);
    const port = parseInt(env.DB_PORT || '5432', 10);
    if (Number.isNaN(port)) {
        throw new ConfigurationError(`DB_PORT must be an integer, got "${env.DB_PORT}"`);
    }
    return {
        host: env.DB_HOST?.trim() ?? '',
        port,
        username: env.DB_USER?.trim() ?? '',
        password: env.DB_PASSWORD ?? '',
        database: env.DB_NAME || 'news_pulse',
    };
}

/**
 * Resolves the whole configuration once at startup. Throws
 * ConfigurationError when the selected backend lacks its connection
 * parameters, so the process can halt before any component is built.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const backend = (env.ARTICLES_BACKEND || 'supabase').trim().toLowerCase();
    if (backend !== 'supabase' && backend !== 'postgres') {
        throw new ConfigurationError(`ARTICLES_BACKEND must be "supabase" or "postgres", got "${backend}"`);
    }

    const port = parseInt(env.PORT || '3000', 10);
    if (Number.isNaN(port)) {
        throw new ConfigurationError(`PORT must be an integer, got "${env.PORT}"`);
    }

    const table = env.ARTICLES_TABLE?.trim() || ARTICLES_TABLE;

    return {
        port,
        backend,
        table,
        supabase: backend === 'supabase' ? readSupabase(env) : undefined,
        postgres: backend === 'postgres' ? readPostgres(env, table) : undefined,
        cacheTtlMs: readSeconds(env, 'CACHE_TTL_SECONDS', 300),
        fetchTimeoutMs: readSeconds(env, 'FETCH_TIMEOUT_SECONDS', 10),
        refreshIntervalMs: readSeconds(env, 'REFRESH_INTERVAL_SECONDS', 300),
    };
}
