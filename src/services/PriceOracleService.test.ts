import { describe, it, expect, vi } from "vitest";
import {
  BaseError,
  ContractFunctionExecutionError,
  ContractFunctionRevertedError,
  encodeErrorResult,
} from "viem";
import { PriceUnavailableError } from "../lib/errors";
import { ASSET } from "../testing/ledgerFixtures";
import {
  FeedFrozenError,
  PRICE_FEED_ABI,
  PriceOracleService,
  isFeedFrozenRevert,
  type CachedPriceRecord,
  type OracleRecord,
  type PriceFeedReader,
} from "./PriceOracleService";

const CHAINLINK_AGGREGATOR = "0x4444444444444444444444444444444444444444";

const oracleRecord: OracleRecord = {
  chainLinkOracle: CHAINLINK_AGGREGATOR,
  decimals: 8,
  heartbeat: 3600,
  isFeedWorking: true,
  isEthIndexed: false,
};

const cachedRecord = (scaledPrice: bigint, lastUpdated: number): CachedPriceRecord => ({
  scaledPrice,
  timestamp: lastUpdated,
  lastUpdated,
  roundId: 0n,
});

function fakeReader(
  live: () => Promise<bigint>,
  cached: () => Promise<CachedPriceRecord>,
  oracle: () => Promise<OracleRecord> = async () => oracleRecord
) {
  return {
    fetchPrice: vi.fn<PriceFeedReader["fetchPrice"]>(live),
    priceRecord: vi.fn<PriceFeedReader["priceRecord"]>(cached),
    oracleRecord: vi.fn<PriceFeedReader["oracleRecord"]>(oracle),
  } satisfies PriceFeedReader;
}

const frozen = async (): Promise<bigint> => {
  throw new FeedFrozenError(ASSET);
};

describe("PriceOracleService", () => {
  it("returns the live price scaled by the feed decimals", async () => {
    const reader = fakeReader(
      async () => 6_000_000_000_000n,
      async () => cachedRecord(0n, 0)
    );

    const observation = await new PriceOracleService(reader, 8).readPrice(ASSET);

    expect(observation).toEqual({
      token: ASSET,
      price: 60_000,
      priceRaw: 6_000_000_000_000n,
      feedFrozen: false,
      lastUpdated: null,
    });
    expect(reader.priceRecord).not.toHaveBeenCalled();
  });

  it("falls back to the cached record when the feed is frozen", async () => {
    const reader = fakeReader(frozen, async () => cachedRecord(5_000_000_000_000n, 1_700_000_000));

    const observation = await new PriceOracleService(reader, 8).readPrice(ASSET);

    expect(observation).toEqual({
      token: ASSET,
      price: 50_000,
      priceRaw: 5_000_000_000_000n,
      feedFrozen: true,
      lastUpdated: 1_700_000_000,
    });
  });

  it("reports a frozen feed without a cached price as unavailable", async () => {
    const reader = fakeReader(frozen, async () => cachedRecord(0n, 0));

    await expect(new PriceOracleService(reader, 8).readPrice(ASSET)).rejects.toMatchObject({
      code: "PRICE_UNAVAILABLE",
      reason: "feed frozen and no cached price recorded",
    });
  });

  it("reports an unreadable cached record as unavailable", async () => {
    const reader = fakeReader(frozen, async () => {
      throw new Error("execution reverted");
    });

    await expect(new PriceOracleService(reader, 8).readPrice(ASSET)).rejects.toMatchObject({
      reason: "feed frozen and cached record unreadable: execution reverted",
    });
  });

  it("does not fall back on other failures", async () => {
    const reader = fakeReader(
      async () => {
        throw new Error("rpc unavailable");
      },
      async () => cachedRecord(1n, 1)
    );

    const error = await new PriceOracleService(reader, 8).readPrice(ASSET).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PriceUnavailableError);
    expect(error).toMatchObject({ token: ASSET, reason: "rpc unavailable" });
    expect(reader.priceRecord).not.toHaveBeenCalled();
  });
});

describe("PriceOracleService.oracleStatus", () => {
  it("reports the oracle configuration beside the raw price record", async () => {
    const reader = fakeReader(frozen, async () => ({
      scaledPrice: 5_000_000_000_000n,
      timestamp: 1_699_999_900,
      lastUpdated: 1_700_000_000,
      roundId: 18_446_744_073_709_562_000n,
    }));

    const status = await new PriceOracleService(reader, 8).oracleStatus(ASSET);

    expect(status).toEqual({
      token: ASSET,
      oracleStatus: oracleRecord,
      priceRecord: {
        scaledPrice: "5000000000000",
        timestamp: 1_699_999_900,
        lastUpdated: 1_700_000_000,
        roundId: "18446744073709562000",
      },
    });
    expect(reader.fetchPrice).not.toHaveBeenCalled();
  });

  it("reports unreadable oracle records as unavailable", async () => {
    const reader = fakeReader(
      frozen,
      async () => cachedRecord(1n, 1),
      async () => {
        throw new Error("execution reverted");
      }
    );

    const error = await new PriceOracleService(reader, 8).oracleStatus(ASSET).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PriceUnavailableError);
    expect(error).toMatchObject({ token: ASSET, reason: "oracle records unreadable: execution reverted" });
  });
});

describe("isFeedFrozenRevert", () => {
  const frozenRevert = () =>
    new ContractFunctionRevertedError({
      abi: PRICE_FEED_ABI,
      data: encodeErrorResult({ abi: PRICE_FEED_ABI, errorName: "PriceFeed__FeedFrozenError", args: [ASSET] }),
      functionName: "fetchPrice",
    });

  it("recognises the frozen-feed revert", () => {
    expect(isFeedFrozenRevert(frozenRevert())).toBe(true);
  });

  it("recognises the revert when wrapped by the contract call error", () => {
    const wrapped = new ContractFunctionExecutionError(frozenRevert(), {
      abi: PRICE_FEED_ABI,
      functionName: "fetchPrice",
      args: [ASSET],
    });

    expect(isFeedFrozenRevert(wrapped)).toBe(true);
  });

  it("ignores other errors", () => {
    expect(isFeedFrozenRevert(new BaseError("request timed out"))).toBe(false);
    expect(isFeedFrozenRevert(new Error("request timed out"))).toBe(false);
  });
});
