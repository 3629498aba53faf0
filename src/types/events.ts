import { z } from "zod";
import type { Address, Hash, Hex } from "viem";

/**
 * Raw log entry as returned by the ledger, already checked to be mined
 */
export interface RawLog {
  address: Address;
  /** Signature hash first, then the indexed values */
  topics: readonly Hex[];
  data: Hex;
  blockNumber: bigint;
  transactionHash: Hash;
  logIndex: number;
}

const uint256 = z.bigint().nonnegative();
const uint8 = z.number().int().min(0).max(255);

// Non-indexed payload of each event the indexer understands
const troveUpdatedFields = z
  .object({ _debt: uint256, _coll: uint256, _stake: uint256, _operation: uint8 })
  .strict();
const troveCreatedFields = z.object({ arrayIndex: uint256 }).strict();
const borrowingFeePaidFields = z.object({ amount: uint256 }).strict();
const totalStakesUpdatedFields = z.object({ _newTotalStakes: uint256 }).strict();
const liquidationFields = z
  .object({
    _liquidatedDebt: uint256,
    _liquidatedColl: uint256,
    _collGasCompensation: uint256,
    _debtGasCompensation: uint256,
  })
  .strict();
const redemptionFields = z
  .object({
    _attemptedDebtAmount: uint256,
    _actualDebtAmount: uint256,
    _collSent: uint256,
    _collFee: uint256,
  })
  .strict();

export const eventFieldSchemas = {
  TroveUpdated: troveUpdatedFields,
  TroveCreated: troveCreatedFields,
  BorrowingFeePaid: borrowingFeePaidFields,
  TotalStakesUpdated: totalStakesUpdatedFields,
  Liquidation: liquidationFields,
  Redemption: redemptionFields,
} satisfies Record<string, z.AnyZodObject>;

export const eventBodySchema = z.discriminatedUnion("name", [
  z.object({ name: z.literal("TroveUpdated"), fields: troveUpdatedFields }),
  z.object({ name: z.literal("TroveCreated"), fields: troveCreatedFields }),
  z.object({ name: z.literal("BorrowingFeePaid"), fields: borrowingFeePaidFields }),
  z.object({ name: z.literal("TotalStakesUpdated"), fields: totalStakesUpdatedFields }),
  z.object({ name: z.literal("Liquidation"), fields: liquidationFields }),
  z.object({ name: z.literal("Redemption"), fields: redemptionFields }),
]);

export type EventBody = z.infer<typeof eventBodySchema>;
export type EventName = EventBody["name"];

interface LedgerEventBase {
  /** Lowercased emitting contract */
  contract: string;
  /** Indexed topic values after the signature; may be shorter than the ABI declares */
  indexed: readonly Hex[];
  transactionHash: Hash;
  blockNumber: bigint;
  logIndex: number;
}

export type DomainEvent = EventBody & LedgerEventBase;
export type DomainEventOf<N extends EventName> = Extract<DomainEvent, { name: N }>;

export function isEventName(name: string): name is EventName {
  return Object.prototype.hasOwnProperty.call(eventFieldSchemas, name);
}

/**
 * Field names a typed event expects in its non-indexed payload
 */
export function expectedFields(name: EventName): string[] {
  return Object.keys(eventFieldSchemas[name].shape);
}

/**
 * Identity of a log within the ledger: `<txHash>:<logIndex>`
 */
export function eventKey(log: { transactionHash: string; logIndex: number }): string {
  return `${log.transactionHash.toLowerCase()}:${log.logIndex}`;
}
