import {
  BaseError,
  ContractFunctionRevertedError,
  parseAbi,
  type Address,
} from "viem";
import type { LedgerPublicClient } from "../config/blockchain";
import { PriceUnavailableError } from "../lib/errors";
import { createLogger, errorMessage } from "../lib/logger";
import { toDecimal } from "../lib/units";

const log = createLogger("PriceOracleService");

export const FEED_FROZEN_ERROR = "PriceFeed__FeedFrozenError";

// PriceFeed ABI (minimal interface)
export const PRICE_FEED_ABI = parseAbi([
  "function fetchPrice(address _token) external returns (uint256)",
  "function priceRecords(address) external view returns (uint96 scaledPrice, uint32 timestamp, uint32 lastUpdated, uint80 roundId)",
  "function oracleRecords(address) external view returns (address chainLinkOracle, uint8 decimals, uint32 heartbeat, bytes4 sharePriceSignature, uint8 sharePriceDecimals, bool isFeedWorking, bool isEthIndexed)",
  "error PriceFeed__FeedFrozenError(address token)",
]);

export interface CachedPriceRecord {
  scaledPrice: bigint;
  timestamp: number;
  lastUpdated: number;
  roundId: bigint;
}

/**
 * Feed configuration and health the price feed keeps per token
 */
export interface OracleRecord {
  chainLinkOracle: Address;
  decimals: number;
  heartbeat: number;
  isFeedWorking: boolean;
  isEthIndexed: boolean;
}

/**
 * Raw oracle state for one token, bigints as decimal strings
 */
export interface OracleDiagnostics {
  token: Address;
  oracleStatus: OracleRecord;
  priceRecord: {
    scaledPrice: string;
    timestamp: number;
    lastUpdated: number;
    roundId: string;
  };
}

/**
 * Live and cached price reads against the price feed contract
 */
export interface PriceFeedReader {
  /** @throws FeedFrozenError when the feed reports itself frozen */
  fetchPrice(token: Address): Promise<bigint>;
  priceRecord(token: Address): Promise<CachedPriceRecord>;
  oracleRecord(token: Address): Promise<OracleRecord>;
}

export interface PriceObservation {
  token: Address;
  price: number;
  priceRaw: bigint;
  feedFrozen: boolean;
  /** Unix seconds of the cached record; null for live prices */
  lastUpdated: number | null;
}

/**
 * The live feed rejected the read because it is frozen
 */
export class FeedFrozenError extends Error {
  constructor(
    public readonly token: Address,
    cause?: unknown
  ) {
    super(`Price feed for ${token} is frozen`);
    this.name = "FeedFrozenError";
    this.cause = cause;
  }
}

/**
 * Whether a viem error is a revert with PriceFeed__FeedFrozenError
 */
export function isFeedFrozenRevert(error: unknown): boolean {
  if (!(error instanceof BaseError)) return false;
  const revert = error.walk((cause) => cause instanceof ContractFunctionRevertedError);
  return revert instanceof ContractFunctionRevertedError && revert.data?.errorName === FEED_FROZEN_ERROR;
}

export class ViemPriceFeedReader implements PriceFeedReader {
  constructor(
    private readonly client: LedgerPublicClient,
    private readonly priceFeed: Address
  ) {}

  async fetchPrice(token: Address): Promise<bigint> {
    try {
      // fetchPrice is nonpayable; simulate it instead of sending a transaction
      const { result } = await this.client.simulateContract({
        address: this.priceFeed,
        abi: PRICE_FEED_ABI,
        functionName: "fetchPrice",
        args: [token],
      });
      return result;
    } catch (error) {
      if (isFeedFrozenRevert(error)) {
        throw new FeedFrozenError(token, error);
      }
      throw error;
    }
  }

  async priceRecord(token: Address): Promise<CachedPriceRecord> {
    const [scaledPrice, timestamp, lastUpdated, roundId] = await this.client.readContract({
      address: this.priceFeed,
      abi: PRICE_FEED_ABI,
      functionName: "priceRecords",
      args: [token],
    });
    return { scaledPrice, timestamp, lastUpdated, roundId };
  }

  async oracleRecord(token: Address): Promise<OracleRecord> {
    const [chainLinkOracle, decimals, heartbeat, , , isFeedWorking, isEthIndexed] = await this.client.readContract({
      address: this.priceFeed,
      abi: PRICE_FEED_ABI,
      functionName: "oracleRecords",
      args: [token],
    });
    return { chainLinkOracle, decimals, heartbeat, isFeedWorking, isEthIndexed };
  }
}

/**
 * Two-tier price reader: the live feed first, the cached record only when
 * the feed is frozen. Any other failure is reported as unavailable.
 */
export class PriceOracleService {
  constructor(
    private readonly reader: PriceFeedReader,
    private readonly priceDecimals: number
  ) {}

  async readPrice(token: Address): Promise<PriceObservation> {
    try {
      const priceRaw = await this.reader.fetchPrice(token);
      return {
        token,
        price: toDecimal(priceRaw, this.priceDecimals),
        priceRaw,
        feedFrozen: false,
        lastUpdated: null,
      };
    } catch (error) {
      if (!(error instanceof FeedFrozenError)) {
        throw new PriceUnavailableError(token, errorMessage(error), error);
      }
      log.warn({ token }, "Price feed frozen, falling back to cached record");
    }

    let record: CachedPriceRecord;
    try {
      record = await this.reader.priceRecord(token);
    } catch (error) {
      throw new PriceUnavailableError(token, `feed frozen and cached record unreadable: ${errorMessage(error)}`, error);
    }

    if (record.scaledPrice === 0n) {
      throw new PriceUnavailableError(token, "feed frozen and no cached price recorded");
    }

    return {
      token,
      price: toDecimal(record.scaledPrice, this.priceDecimals),
      priceRaw: record.scaledPrice,
      feedFrozen: true,
      lastUpdated: record.lastUpdated,
    };
  }

  /**
   * Oracle configuration and the cached price record, read together
   */
  async oracleStatus(token: Address): Promise<OracleDiagnostics> {
    let oracleStatus: OracleRecord;
    let record: CachedPriceRecord;
    try {
      [oracleStatus, record] = await Promise.all([
        this.reader.oracleRecord(token),
        this.reader.priceRecord(token),
      ]);
    } catch (error) {
      throw new PriceUnavailableError(token, `oracle records unreadable: ${errorMessage(error)}`, error);
    }

    return {
      token,
      oracleStatus,
      priceRecord: {
        scaledPrice: record.scaledPrice.toString(),
        timestamp: record.timestamp,
        lastUpdated: record.lastUpdated,
        roundId: record.roundId.toString(),
      },
    };
  }
}
