import type { Server } from "http";
import { createApp } from "./app";
import { createLedgerClient } from "./config/blockchain";
import { getWatchedContracts } from "./config/contracts";
import { DatabaseConnection } from "./config/database";
import { getIndexerConfig } from "./config/env";
import { createLogger, errorMessage } from "./lib/logger";
import { BatchProcessor } from "./services/BatchProcessor";
import { MongoCursorStore } from "./services/CursorStore";
import { loadDecodingTable } from "./services/DecodingTable";
import { EventDecoder } from "./services/EventDecoder";
import { fromPublicClient, LogFetcher } from "./services/LogFetcher";
import { MetricsService } from "./services/MetricsService";
import { MongoPositionGateway } from "./services/MongoPositionGateway";
import { PositionFolder } from "./services/PositionFolder";
import { PriceOracleService, ViemPriceFeedReader } from "./services/PriceOracleService";
import { TailingScheduler } from "./services/TailingScheduler";

const log = createLogger("main");

const CURSOR_NAME = "trove-positions";

async function main(): Promise<void> {
  const config = getIndexerConfig();

  log.info(
    {
      chainId: config.chainId,
      troveManager: config.contracts.troveManager,
      borrowerOperations: config.contracts.borrowerOperations,
      startBlock: config.scheduler.startBlock.toString(),
      batchSize: config.scheduler.batchSize,
    },
    "Initializing services..."
  );

  const dbConnection = DatabaseConnection.getInstance();
  await dbConnection.connect(config.mongoUrl);

  const client = createLedgerClient(config);
  const table = await loadDecodingTable(getWatchedContracts(config));
  const gateway = new MongoPositionGateway();

  const fetcher = new LogFetcher(fromPublicClient(client), table.addresses());
  const folder = new PositionFolder(gateway, { decimals: config.decimals });
  const processor = new BatchProcessor(new EventDecoder(table), folder, gateway);
  const scheduler = new TailingScheduler(
    fetcher,
    processor,
    new MongoCursorStore(CURSOR_NAME),
    config.scheduler
  );

  const priceFeed = config.contracts.priceFeed;
  const oracle = priceFeed
    ? new PriceOracleService(new ViemPriceFeedReader(client, priceFeed), config.priceDecimals)
    : null;
  if (!oracle) {
    log.warn("PRICE_FEED_ADDRESS not set; metrics will be reported without prices");
  }

  const app = createApp({
    gateway,
    metrics: new MetricsService(gateway, oracle),
    oracle,
    scheduler,
    database: dbConnection,
  });

  const server: Server = app.listen(config.port, () => {
    log.info({ port: config.port }, `Trove position indexer API listening on port ${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string, exitCode: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, "Shutting down gracefully...");

    scheduler.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await dbConnection.disconnect();
    process.exit(exitCode);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal, 0).catch((error) => {
      log.error({ error: errorMessage(error) }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  scheduler
    .run()
    .then(() => {
      log.info("Ingestion loop finished");
    })
    .catch((error) => {
      log.fatal({ error: errorMessage(error) }, "Ingestion halted");
      return shutdown("halt", 1);
    })
    .catch((error) => {
      log.error({ error: errorMessage(error) }, "Shutdown failed");
      process.exit(1);
    });
}

main().catch((error) => {
  log.fatal({ error: errorMessage(error) }, "Failed to start indexer");
  process.exit(1);
});
