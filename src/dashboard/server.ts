import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { isVaultError, VaultErrorCode } from '../core/errors';
import { VaultService } from '../services/vaultService';
import { SerializedRecord, toJsonRecord } from '../storage/snapshotCodec';
import { ProtocolStats, UserStats } from '../types';
import logger from '../utils/logger';
import { formatAmount } from '../utils/math';

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE SHAPES: bigints travel as decimal strings of micro-units
// ═══════════════════════════════════════════════════════════════════════════════

export function buildStatsResponse(stats: ProtocolStats): SerializedRecord {
  return {
    ...toJsonRecord(stats),
    tvlDisplay: formatAmount(stats.tvl),
    idleBalanceDisplay: formatAmount(stats.idleBalance),
    accumulatedFeesDisplay: formatAmount(stats.accumulatedFees),
  };
}

export function buildPositionResponse(stats: UserStats): SerializedRecord {
  return {
    ...toJsonRecord(stats),
    balanceDisplay: formatAmount(stats.balance),
  };
}

const STATUS_BY_CODE: Partial<Record<VaultErrorCode, number>> = {
  NotInitialized: 503,
  PositionNotFound: 404,
  UndefinedNav: 409,
};

export function errorStatus(err: unknown): number {
  if (!isVaultError(err)) return 500;
  return STATUS_BY_CODE[err.code] ?? 400;
}

// ═══════════════════════════════════════════════════════════════════════════════
// APP
// ═══════════════════════════════════════════════════════════════════════════════

export function createDashboardApp(service: VaultService): express.Express {
  const app = express();

  app.get('/health', async (_req, res, next) => {
    try {
      res.json({ status: 'ok', initialized: await service.isInitialized() });
    } catch (err) {
      next(err);
    }
  });

  app.get('/stats', async (_req, res, next) => {
    try {
      res.json(buildStatsResponse(await service.getProtocolStats()));
    } catch (err) {
      next(err);
    }
  });

  app.get('/positions/:owner', async (req, res, next) => {
    try {
      res.json(buildPositionResponse(await service.getUserStats(req.params.owner)));
    } catch (err) {
      next(err);
    }
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    const message = err instanceof Error ? err.message : String(err);
    if (status >= 500) {
      logger.error(`[DASHBOARD] ${req.method} ${req.path} failed: ${message}`);
    }
    res.status(status).json({
      error: isVaultError(err) ? err.code : 'InternalError',
      message,
    });
  });

  return app;
}

export function startDashboard(service: VaultService, port: number): Server {
  const app = createDashboardApp(service);
  return app.listen(port, () => {
    logger.info(`[DASHBOARD] Running at http://localhost:${port}`);
  });
}
