import { describe, it, expect } from "vitest";
import { concat, encodeAbiParameters, encodeEventTopics, pad, toEventSelector } from "viem";
import { DecodeSkipError } from "../lib/errors";
import {
  BORROWER_OPERATIONS,
  E18,
  TROVE_MANAGER,
  WALLET,
  buildTable,
  troveCreatedLog,
  troveEventsAbi,
  troveUpdatedLog,
  txHash,
} from "../testing/ledgerFixtures";
import { DecodingTable } from "./DecodingTable";
import { EventDecoder } from "./EventDecoder";

describe("EventDecoder", () => {
  const decoder = new EventDecoder(buildTable());

  it("decodes a TroveUpdated log into its typed shape", () => {
    const result = decoder.decode(
      troveUpdatedLog({ debt: 5n * E18, coll: 10n * E18, operation: 0, blockNumber: 100n, logIndex: 3 })
    );

    expect(result.status).toBe("decoded");
    if (result.status !== "decoded") return;
    expect(result.event.name).toBe("TroveUpdated");
    expect(result.event.fields).toEqual({
      _debt: 5n * E18,
      _coll: 10n * E18,
      _stake: 10n * E18,
      _operation: 0,
    });
    expect(result.event.contract).toBe(TROVE_MANAGER);
    expect(result.event.indexed).toHaveLength(2);
    expect(result.event.blockNumber).toBe(100n);
    expect(result.event.logIndex).toBe(3);
    expect(result.event.transactionHash).toBe(txHash(100));
  });

  it("decodes events of the second watched contract", () => {
    const result = decoder.decode(troveCreatedLog(101n, 7n));

    expect(result.status).toBe("decoded");
    if (result.status !== "decoded") return;
    expect(result.event.name).toBe("TroveCreated");
    expect(result.event.fields).toEqual({ arrayIndex: 7n });
    expect(result.event.contract).toBe(BORROWER_OPERATIONS);
  });

  it("reports a log without topics as unresolved", () => {
    const log = { ...troveUpdatedLog({ debt: 1n, coll: 1n, operation: 0, blockNumber: 1n }), topics: [] };

    expect(decoder.decode(log)).toEqual({ status: "unresolved", selector: null });
  });

  it("reports a log from an unwatched emitter as unresolved", () => {
    const log = troveUpdatedLog({
      debt: 1n,
      coll: 1n,
      operation: 0,
      blockNumber: 1n,
      emitter: "0x00000000000000000000000000000000000000c3",
    });

    expect(decoder.decode(log)).toEqual({ status: "unresolved", selector: log.topics[0] });
  });

  it("reports an event missing from the table as unresolved", () => {
    const [selector] = encodeEventTopics({ abi: troveEventsAbi, eventName: "BaseRateUpdated" });
    const result = decoder.decode({
      address: TROVE_MANAGER,
      topics: [selector],
      data: encodeAbiParameters([{ type: "uint256" }], [1n]),
      blockNumber: 1n,
      transactionHash: txHash(1),
      logIndex: 0,
    });

    expect(result).toEqual({ status: "unresolved", selector });
  });

  it("skips a resolved log whose payload is truncated", () => {
    const log = { ...troveUpdatedLog({ debt: 1n, coll: 1n, operation: 0, blockNumber: 1n }), data: "0x1234" as const };
    const result = decoder.decode(log);

    expect(result.status).toBe("skipped");
    if (result.status !== "skipped") return;
    expect(result.error).toBeInstanceOf(DecodeSkipError);
    expect(result.error.eventName).toBe("TroveUpdated");
    expect(result.error.reason).toBe("payload is 2 bytes, expected 128");
  });

  it("skips a resolved log whose payload carries trailing words", () => {
    const log = troveUpdatedLog({ debt: 1n, coll: 1n, operation: 0, blockNumber: 1n });
    const result = decoder.decode({ ...log, data: concat([log.data, pad("0x01")]) });

    expect(result.status).toBe("skipped");
    if (result.status !== "skipped") return;
    expect(result.error.eventName).toBe("TroveUpdated");
    expect(result.error.reason).toBe("payload is 160 bytes, expected 128");
  });

  it("skips a payload that decodes but fails the typed shape", () => {
    const table = DecodingTable.fromContracts([
      {
        label: "BorrowerOperations",
        address: BORROWER_OPERATIONS,
        abi: [
          {
            type: "event",
            name: "TroveCreated",
            inputs: [
              { name: "_borrower", type: "address", indexed: true },
              { name: "arrayIndex", type: "int256", indexed: false },
            ],
          },
        ],
      },
    ]);
    const result = new EventDecoder(table).decode({
      address: BORROWER_OPERATIONS,
      topics: [toEventSelector("TroveCreated(address,int256)"), `0x000000000000000000000000${WALLET.slice(2)}`],
      data: encodeAbiParameters([{ type: "int256" }], [-1n]),
      blockNumber: 1n,
      transactionHash: txHash(1),
      logIndex: 0,
    });

    expect(result.status).toBe("skipped");
    if (result.status !== "skipped") return;
    expect(result.error.reason.startsWith("fields.arrayIndex: ")).toBe(true);
  });
});
