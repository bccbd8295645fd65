import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { RemoteRecord, RemoteTableClient } from '../types';
import { SupabaseConfig } from '../config/env';
import { ConnectivityError } from '../errors';

function isRecord(value: unknown): value is RemoteRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a table through the Supabase client. All rows come back in
 * whatever order the store returns; no filtering or ordering is pushed to
 * the server. The fetch deadline is enforced by the cache.
 */
export class SupabaseTableClient implements RemoteTableClient {
    private readonly supabase: SupabaseClient;

    constructor(config: SupabaseConfig, supabase?: SupabaseClient) {
        this.supabase =
            supabase ||
            createClient(config.url, config.key, {
                auth: {
                    persistSession: false,
                    autoRefreshToken: false,
                },
                db: {
                    schema: 'public',
                },
            });
    }

    async selectAll(table: string): Promise<RemoteRecord[]> {
        const response = await this.query(table);
        const { error, status } = response;
        if (error) {
            if (status > 0) {
                throw new ConnectivityError(`Supabase returned HTTP ${status} for table "${table}": ${error.message}`, {
                    cause: error,
                    status,
                });
            }
            throw new ConnectivityError(`Supabase request failed: ${error.message}`, { cause: error });
        }

        const data: unknown = response.data;
        if (!Array.isArray(data)) {
            throw new ConnectivityError(`Unexpected response for table "${table}": expected an array of rows`);
        }
        return data.filter(isRecord);
    }

    private async query(table: string) {
        try {
            return await this.supabase.from(table).select('*');
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Unknown error';
            throw new ConnectivityError(`Supabase request failed: ${message}`, { cause: error });
        }
    }
}
