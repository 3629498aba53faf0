import { describe, it, expect, vi } from "vitest";
import { TransientFetchError } from "../lib/errors";
import { TROVE_MANAGER, BORROWER_OPERATIONS, txHash } from "../testing/ledgerFixtures";
import { LogFetcher, type LedgerClient, type LedgerLog } from "./LogFetcher";

const ledgerLog = (blockNumber: bigint | null, logIndex: number | null): LedgerLog => ({
  address: TROVE_MANAGER,
  topics: [],
  data: "0x",
  blockNumber,
  transactionHash: txHash(Number(blockNumber ?? 0n)),
  logIndex,
});

function fakeClient(logs: readonly LedgerLog[] = [], head = 200n) {
  return {
    getBlockNumber: vi.fn(async () => head),
    getLogs: vi.fn<LedgerClient["getLogs"]>(async () => logs),
  } satisfies LedgerClient;
}

describe("LogFetcher", () => {
  it("returns logs ordered by block and log index", async () => {
    const client = fakeClient([ledgerLog(12n, 0), ledgerLog(10n, 4), ledgerLog(12n, 1), ledgerLog(10n, 2)]);
    const fetcher = new LogFetcher(client, [TROVE_MANAGER]);

    const logs = await fetcher.fetchRange(10n, 12n);

    expect(logs.map((log) => [log.blockNumber, log.logIndex])).toEqual([
      [10n, 2],
      [10n, 4],
      [12n, 0],
      [12n, 1],
    ]);
  });

  it("queries the watched addresses over the inclusive range", async () => {
    const client = fakeClient();
    await new LogFetcher(client, [TROVE_MANAGER, BORROWER_OPERATIONS]).fetchRange(5n, 9n);

    expect(client.getLogs).toHaveBeenCalledWith({
      address: [TROVE_MANAGER, BORROWER_OPERATIONS],
      fromBlock: 5n,
      toBlock: 9n,
    });
  });

  it("queries every contract when no address is watched", async () => {
    const client = fakeClient();
    await new LogFetcher(client, []).fetchRange(5n, 5n);

    expect(client.getLogs).toHaveBeenCalledWith({ address: undefined, fromBlock: 5n, toBlock: 5n });
  });

  it("wraps ledger failures as transient", async () => {
    const client = fakeClient();
    client.getLogs.mockRejectedValueOnce(new Error("socket hang up"));

    const error = await new LogFetcher(client, [TROVE_MANAGER]).fetchRange(1n, 2n).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error).toMatchObject({ operation: "eth_getLogs 1-2" });
  });

  it("treats a pending log as a transient failure", async () => {
    const fetcher = new LogFetcher(fakeClient([ledgerLog(null, null)]), [TROVE_MANAGER]);

    await expect(fetcher.fetchRange(1n, 2n)).rejects.toBeInstanceOf(TransientFetchError);
  });

  it("rejects an inverted range", async () => {
    const fetcher = new LogFetcher(fakeClient(), [TROVE_MANAGER]);

    await expect(fetcher.fetchRange(9n, 5n)).rejects.toBeInstanceOf(RangeError);
  });

  it("reads the chain head", async () => {
    expect(await new LogFetcher(fakeClient([], 321n), []).currentHead()).toBe(321n);
  });

  it("wraps head failures as transient", async () => {
    const client = fakeClient();
    client.getBlockNumber.mockRejectedValueOnce(new Error("timeout"));

    await expect(new LogFetcher(client, []).currentHead()).rejects.toMatchObject({
      code: "TRANSIENT_FETCH",
      operation: "eth_blockNumber",
    });
  });
});
