import { once } from "events";
import { beforeEach, describe, it, expect } from "vitest";
import type { Express } from "express";
import { createApp, type AppServices } from "./app";
import { MetricsService } from "./services/MetricsService";
import { PriceOracleService, type PriceFeedReader } from "./services/PriceOracleService";
import { InMemoryPositionGateway } from "./testing/InMemoryPositionGateway";
import { ASSET, WALLET } from "./testing/ledgerFixtures";
import type { Position } from "./types/position";

const NOW = new Date("2026-01-01T00:00:00.000Z");

const feedReader: PriceFeedReader = {
  fetchPrice: async () => 200_000_000n,
  priceRecord: async () => ({ scaledPrice: 190_000_000n, timestamp: 1_700_000_000, lastUpdated: 1_700_000_060, roundId: 42n }),
  oracleRecord: async () => ({
    chainLinkOracle: "0x4444444444444444444444444444444444444444",
    decimals: 8,
    heartbeat: 3600,
    isFeedWorking: true,
    isEthIndexed: false,
  }),
};

const openPosition: Position = {
  positionId: 1,
  walletAddress: WALLET,
  asset: ASSET,
  collateral: 10,
  debt: 5,
  healthRatio: 50,
  status: "active",
  blockNumber: 100,
  history: [
    {
      transactionHash: `0x${"ab".repeat(32)}`,
      logIndex: 0,
      eventKey: `0x${"ab".repeat(32)}:0`,
      collateral: 10,
      debt: 5,
      operation: "Opened",
      timestamp: NOW.toISOString(),
      blockNumber: 100,
    },
  ],
};

async function request(app: Express, path: string): Promise<{ status: number; body: unknown }> {
  const server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  try {
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    const response = await fetch(`http://127.0.0.1:${address.port}${path}`);
    return { status: response.status, body: await response.json() };
  } finally {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  }
}

describe("HTTP API", () => {
  let gateway: InMemoryPositionGateway;
  let services: AppServices;

  beforeEach(async () => {
    gateway = new InMemoryPositionGateway();
    await gateway.insert(openPosition);
    await gateway.insert({ ...openPosition, positionId: 2, asset: "", history: [] });
    services = {
      gateway,
      metrics: new MetricsService(gateway, null, () => NOW),
      oracle: new PriceOracleService(feedReader, 8),
      scheduler: {
        getStatus: () => ({ state: "idle", cursor: "120", head: "119", running: true }),
      },
      database: {
        getConnectionStatus: () => true,
        getConnectionInfo: () => ({ isConnected: true, readyState: 1, host: "127.0.0.1", name: "positions-test" }),
      },
      now: () => NOW,
    };
  });

  it("reports health with scheduler and database state", async () => {
    const { status, body } = await request(createApp(services), "/health");

    expect(status).toBe(200);
    expect(body).toEqual({
      status: "healthy",
      timestamp: NOW.toISOString(),
      service: "trove-position-indexer",
      scheduler: { state: "idle", cursor: "120", head: "119", running: true },
      database: { isConnected: true, readyState: 1, host: "127.0.0.1", name: "positions-test" },
    });
  });

  it("reports degraded health while the database is unreachable", async () => {
    const app = createApp({
      ...services,
      database: {
        getConnectionStatus: () => false,
        getConnectionInfo: () => ({ isConnected: false, readyState: 0 }),
      },
    });

    const { status, body } = await request(app, "/health");

    expect(status).toBe(503);
    expect(body).toMatchObject({
      status: "degraded",
      database: { isConnected: false, readyState: 0 },
    });
  });

  it("lists a wallet's positions newest first", async () => {
    const { status, body } = await request(createApp(services), `/api/positions/${WALLET}`);

    expect(status).toBe(200);
    expect(body).toMatchObject({ walletAddress: WALLET, count: 2 });
    expect(body).toHaveProperty(["positions", 0, "positionId"], 2);
    expect(body).toHaveProperty(["positions", 1, "positionId"], 1);
  });

  it("returns one position with its history", async () => {
    const { status, body } = await request(createApp(services), "/api/positions/id/1");

    expect(status).toBe(200);
    expect(body).toEqual({ position: openPosition });
  });

  it("answers 404 for an unknown position", async () => {
    const { status, body } = await request(createApp(services), "/api/positions/id/99");

    expect(status).toBe(404);
    expect(body).toEqual({ error: "Position #99 not found" });
  });

  it("answers 400 for a malformed position id", async () => {
    const { status } = await request(createApp(services), "/api/positions/id/abc");

    expect(status).toBe(400);
  });

  it("serves system metrics", async () => {
    const { status, body } = await request(createApp(services), "/metrics");

    expect(status).toBe(200);
    expect(body).toMatchObject({ totalActivePositions: 2, timestamp: NOW.toISOString() });
  });

  it("answers 503 when a price cannot be read", async () => {
    const oracle = new PriceOracleService(
      {
        ...feedReader,
        fetchPrice: async () => {
          throw new Error("rpc unavailable");
        },
      },
      8
    );
    const app = createApp({ ...services, metrics: new MetricsService(gateway, oracle, () => NOW) });

    const { status, body } = await request(app, "/metrics");

    expect(status).toBe(503);
    expect(body).toEqual({ error: "Price unavailable", token: ASSET, details: "rpc unavailable" });
  });

  it("serves the raw oracle state for a token", async () => {
    const { status, body } = await request(createApp(services), `/debug/oracle?token=${ASSET}`);

    expect(status).toBe(200);
    expect(body).toEqual({
      token: ASSET,
      oracleStatus: {
        chainLinkOracle: "0x4444444444444444444444444444444444444444",
        decimals: 8,
        heartbeat: 3600,
        isFeedWorking: true,
        isEthIndexed: false,
      },
      priceRecord: {
        scaledPrice: "190000000",
        timestamp: 1_700_000_000,
        lastUpdated: 1_700_000_060,
        roundId: "42",
      },
    });
  });

  it("answers 400 for a malformed oracle token", async () => {
    const { status, body } = await request(createApp(services), "/debug/oracle?token=0x1234");

    expect(status).toBe(400);
    expect(body).toEqual({ error: "Invalid token address" });
  });

  it("answers 503 when the oracle records cannot be read", async () => {
    const oracle = new PriceOracleService(
      {
        ...feedReader,
        oracleRecord: async () => {
          throw new Error("execution reverted");
        },
      },
      8
    );

    const { status, body } = await request(createApp({ ...services, oracle }), `/debug/oracle?token=${ASSET}`);

    expect(status).toBe(503);
    expect(body).toEqual({
      error: "Oracle unavailable",
      token: ASSET,
      details: "oracle records unreadable: execution reverted",
    });
  });

  it("answers 503 for oracle status without a configured price feed", async () => {
    const { status, body } = await request(createApp({ ...services, oracle: null }), `/debug/oracle?token=${ASSET}`);

    expect(status).toBe(503);
    expect(body).toEqual({ error: "Price feed not configured" });
  });
});
