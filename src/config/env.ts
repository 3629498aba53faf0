import 'dotenv/config';
import path from 'path';
import { z } from 'zod';
import { isAddress, type Address } from 'viem';
import { ConfigError } from '../lib/errors';
import { LOG_LEVELS } from '../lib/logger';
import { DecimalScales } from '../lib/units';

const address = z.string().transform((value, ctx): Address => {
  const lower = value.toLowerCase();
  if (!isAddress(lower, { strict: false })) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a 20-byte hex address' });
    return z.NEVER;
  }
  return lower;
});

const blockNumber = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((value) => BigInt(value));

const decimals = z.coerce.number().int().min(0).max(36);

const assetDecimals = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(
    z.record(
      z.string().refine((value): boolean => isAddress(value, { strict: false }), 'keys must be addresses'),
      z.object({ collateral: decimals.optional(), debt: decimals.optional() }).strict()
    )
  );

const envSchema = z.object({
  RPC_URL: z.string().url(),
  CHAIN_ID: z.coerce.number().int().positive().default(3636),
  CHAIN_NAME: z.string().default('Botanix Testnet'),
  MONGO_URL: z.string().min(1),
  TROVE_MANAGER_ADDRESS: address,
  BORROWER_OPERATIONS_ADDRESS: address,
  PRICE_FEED_ADDRESS: address.optional(),
  ABI_DIR: z.string().optional(),
  START_BLOCK: blockNumber.default('0'),
  BATCH_SIZE: z.coerce.number().int().positive().default(500),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  RETRY_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
  COLL_DECIMALS: decimals.default(18),
  DEBT_DECIMALS: decimals.default(18),
  PRICE_DECIMALS: decimals.default(8),
  ASSET_DECIMALS: assetDecimals.default('{}'),
  PORT: z.coerce.number().int().positive().default(3001),
  // Read by the logger when it loads; validated here so a typo fails startup
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface ContractAddresses {
  troveManager: Address;
  borrowerOperations: Address;
  priceFeed?: Address;
}

export interface SchedulerConfig {
  /** First block to index when no cursor has been persisted */
  startBlock: bigint;
  /** Blocks per getLogs request */
  batchSize: number;
  /** Wait between head checks once caught up (milliseconds) */
  pollIntervalMs: number;
  /** Wait before retrying a failed batch (milliseconds) */
  retryIntervalMs: number;
}

export interface IndexerConfig {
  rpcUrl: string;
  chainId: number;
  chainName: string;
  mongoUrl: string;
  contracts: ContractAddresses;
  abiDir: string;
  scheduler: SchedulerConfig;
  decimals: DecimalScales;
  priceDecimals: number;
  port: number;
}

/**
 * Read and validate the indexer configuration from the environment.
 *
 * @throws ConfigError listing every invalid variable
 */
export function getIndexerConfig(env: NodeJS.ProcessEnv = process.env): IndexerConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;

  return {
    rpcUrl: vars.RPC_URL,
    chainId: vars.CHAIN_ID,
    chainName: vars.CHAIN_NAME,
    mongoUrl: vars.MONGO_URL,
    contracts: {
      troveManager: vars.TROVE_MANAGER_ADDRESS,
      borrowerOperations: vars.BORROWER_OPERATIONS_ADDRESS,
      priceFeed: vars.PRICE_FEED_ADDRESS,
    },
    abiDir: vars.ABI_DIR ?? path.resolve(__dirname, '../../abi'),
    scheduler: {
      startBlock: vars.START_BLOCK,
      batchSize: vars.BATCH_SIZE,
      pollIntervalMs: vars.POLL_INTERVAL_MS,
      retryIntervalMs: vars.RETRY_INTERVAL_MS,
    },
    decimals: new DecimalScales(
      { collateral: vars.COLL_DECIMALS, debt: vars.DEBT_DECIMALS },
      vars.ASSET_DECIMALS
    ),
    priceDecimals: vars.PRICE_DECIMALS,
    port: vars.PORT,
  };
}
