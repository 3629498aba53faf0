import express, { type Express, type Request, type Response } from "express";
import cors from "cors";
import { isAddress } from "viem";
import { PriceUnavailableError } from "./lib/errors";
import { createLogger, errorMessage } from "./lib/logger";
import type { MetricsService } from "./services/MetricsService";
import type { PositionGateway } from "./services/PositionGateway";
import type { PriceOracleService } from "./services/PriceOracleService";
import type { SchedulerStatus } from "./services/TailingScheduler";

const log = createLogger("api");

export interface DatabaseStatus {
  getConnectionStatus(): boolean;
  getConnectionInfo(): { isConnected: boolean; readyState: number; host?: string; name?: string };
}

export interface SchedulerStatusSource {
  getStatus(): SchedulerStatus;
}

export interface AppServices {
  gateway: PositionGateway;
  metrics: MetricsService;
  /** null when no price feed is configured */
  oracle: PriceOracleService | null;
  scheduler: SchedulerStatusSource;
  database: DatabaseStatus;
  now?: () => Date;
}

/**
 * Read API over the indexed positions
 */
export function createApp(services: AppServices): Express {
  const { gateway, metrics, oracle, scheduler, database } = services;
  const now = services.now ?? (() => new Date());
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint; degraded while the database is unreachable
  app.get("/health", (_req: Request, res: Response) => {
    const healthy = database.getConnectionStatus();
    res.status(healthy ? 200 : 503).json({
      status: healthy ? "healthy" : "degraded",
      timestamp: now().toISOString(),
      service: "trove-position-indexer",
      scheduler: scheduler.getStatus(),
      database: database.getConnectionInfo(),
    });
  });

  // Basic info endpoint
  app.get("/", (_req: Request, res: Response) => {
    res.json({
      message: "Trove Position Indexer",
      endpoints: {
        health: "/health",
        "wallet-positions": "/api/positions/:walletAddress",
        position: "/api/positions/id/:positionId",
        metrics: "/metrics",
        "oracle-debug": "/debug/oracle?token=:address",
      },
    });
  });

  // Get one position with its history
  app.get("/api/positions/id/:positionId", async (req: Request, res: Response): Promise<void> => {
    const positionId = Number(req.params.positionId);
    if (!Number.isInteger(positionId) || positionId < 1) {
      res.status(400).json({ error: "Invalid position id" });
      return;
    }

    try {
      const position = await gateway.findById(positionId);
      if (!position) {
        res.status(404).json({ error: `Position #${positionId} not found` });
        return;
      }
      res.json({ position });
    } catch (error) {
      log.error({ positionId, error: errorMessage(error) }, "Failed to get position");
      res.status(500).json({ error: "Failed to get position", details: errorMessage(error) });
    }
  });

  // Get the positions of a wallet
  app.get("/api/positions/:walletAddress", async (req: Request, res: Response): Promise<void> => {
    const walletAddress = req.params.walletAddress.toLowerCase();

    try {
      const positions = await gateway.findByWallet(walletAddress);
      res.json({
        walletAddress,
        positions,
        count: positions.length,
      });
    } catch (error) {
      log.error({ walletAddress, error: errorMessage(error) }, "Failed to get wallet positions");
      res.status(500).json({ error: "Failed to get wallet positions", details: errorMessage(error) });
    }
  });

  // System metrics over active positions
  app.get("/metrics", async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json(await metrics.getMetrics());
    } catch (error) {
      if (error instanceof PriceUnavailableError) {
        log.warn({ token: error.token, reason: error.reason }, "Metrics unavailable");
        res.status(503).json({ error: "Price unavailable", token: error.token, details: error.reason });
        return;
      }
      log.error({ error: errorMessage(error) }, "Failed to compute metrics");
      res.status(500).json({ error: "Failed to compute metrics", details: errorMessage(error) });
    }
  });

  // Raw oracle state for one collateral token
  app.get("/debug/oracle", async (req: Request, res: Response): Promise<void> => {
    const token = req.query.token;
    if (typeof token !== "string" || !isAddress(token, { strict: false })) {
      res.status(400).json({ error: "Invalid token address" });
      return;
    }
    if (!oracle) {
      res.status(503).json({ error: "Price feed not configured" });
      return;
    }

    try {
      res.json(await oracle.oracleStatus(token));
    } catch (error) {
      if (error instanceof PriceUnavailableError) {
        log.warn({ token, reason: error.reason }, "Oracle status unavailable");
        res.status(503).json({ error: "Oracle unavailable", token, details: error.reason });
        return;
      }
      log.error({ token, error: errorMessage(error) }, "Failed to read oracle status");
      res.status(500).json({ error: "Failed to read oracle status", details: errorMessage(error) });
    }
  });

  return app;
}
