import "reflect-metadata";
import dotenv from 'dotenv';
import { createApp } from './app';
import { AppConfig, loadConfig } from './config/env';
import { ConfigurationError } from './errors';
import { getRemoteClient } from './services/remoteClients';
import { ArticleCache } from './services/ArticleCache';
import { DashboardService } from './services/DashboardService';
import { LinearFilterPipeline } from './services/FilterPipeline';
import { LocalOverrideLoader } from './services/LocalOverrideLoader';

// Load environment variables
dotenv.config();

function resolveConfig(): AppConfig {
    try {
        return loadConfig();
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error(`[CONFIG] ${error.message}`);
            process.exit(1);
        }
        throw error;
    }
}

function warm(cache: ArticleCache): void {
    cache
        .get()
        .then((result) => {
            if (result.error) {
                console.error(`[SERVER] Background refresh ended ${result.status}: ${result.error.message}`);
            }
        })
        .catch((error) => console.error('[SERVER] Background refresh crashed:', error));
}

const config = resolveConfig();

const cache = new ArticleCache({
    client: getRemoteClient(config),
    table: config.table,
    ttlMs: config.cacheTtlMs,
    fetchTimeoutMs: config.fetchTimeoutMs,
});
const service = new DashboardService(cache, new LinearFilterPipeline(), new LocalOverrideLoader());
const app = createApp(service);

const server = app.listen(config.port, () => {
    console.log(`[SERVER] Dashboard running at http://localhost:${config.port} (backend: ${config.backend})`);
    warm(cache);
});

const timer =
    config.refreshIntervalMs > 0 ? setInterval(() => warm(cache), config.refreshIntervalMs) : undefined;

function shutdown(signal: string): void {
    console.log(`[SERVER] ${signal} received, shutting down`);
    if (timer) clearInterval(timer);
    server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
