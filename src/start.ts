import 'dotenv/config';

import { Server } from 'http';
import { bootstrapVault } from './bootstrap';
import { DEFAULT_CONFIG } from './config/default';
import { startDashboard } from './dashboard/server';
import logger from './utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME STATE
// ═══════════════════════════════════════════════════════════════════════════════

let server: Server | null = null;
let isShuttingDown = false;

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

function gracefulShutdown(signal: string): void {
    if (isShuttingDown) {
        logger.info(`[SHUTDOWN] Already shutting down, ignoring ${signal}`);
        return;
    }
    isShuttingDown = true;
    logger.info(`[SHUTDOWN] Received ${signal} - closing dashboard`);

    if (!server) {
        process.exit(0);
    }
    server.close(err => {
        if (err) {
            logger.error(`[SHUTDOWN] Error closing dashboard: ${err.message}`);
            process.exit(1);
        }
        logger.info('[SHUTDOWN] Graceful shutdown complete');
        process.exit(0);
    });
}

function attachProcessHandlers(): void {
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));

    process.on('uncaughtException', error => {
        logger.error(`[FATAL] Uncaught Exception: ${error.message}`, { stack: error.stack });
        gracefulShutdown('uncaughtException');
    });

    process.on('unhandledRejection', reason => {
        logger.error(`[FATAL] Unhandled Rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════════════════════

async function start(): Promise<void> {
    attachProcessHandlers();
    const service = await bootstrapVault();
    server = startDashboard(service, DEFAULT_CONFIG.DASHBOARD_PORT);
}

start().catch((err: unknown) => {
    logger.error(`[STARTUP] Fatal: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
