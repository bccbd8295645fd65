import { SupabaseTableClient } from './SupabaseTableClient';
import { PostgresTableClient } from './PostgresTableClient';
import { RemoteTableClient } from '../types';
import { AppConfig } from '../config/env';
import { createDataSource } from '../config/database';
import { ConfigurationError } from '../errors';

export function getRemoteClient(config: AppConfig): RemoteTableClient {
    if (config.backend === 'supabase' && config.supabase) {
        return new SupabaseTableClient(config.supabase);
    } else if (config.backend === 'postgres' && config.postgres) {
        return new PostgresTableClient(createDataSource(config.postgres));
    }
    throw new ConfigurationError(`No connection settings for backend: ${config.backend}`);
}
