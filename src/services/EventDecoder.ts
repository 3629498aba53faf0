import { decodeAbiParameters, size, type AbiParameter, type Hex } from "viem";
import { DecodeSkipError } from "../lib/errors";
import { eventBodySchema, type DomainEvent, type RawLog } from "../types/events";
import type { DecodingTable } from "./DecodingTable";

export type DecodeResult =
  | { status: "decoded"; event: DomainEvent }
  | { status: "unresolved"; selector: Hex | null }
  | { status: "skipped"; error: DecodeSkipError };

// One 32-byte word each; dynamic, array and tuple types have no fixed payload size
const isSingleWord = (input: AbiParameter): boolean =>
  input.type !== "string" && input.type !== "bytes" && !input.type.endsWith("]") && !input.type.startsWith("tuple");

/**
 * Turns raw log entries into typed domain events using the decoding table.
 *
 * Logs whose (address, selector) pair is not in the table come back as
 * `unresolved`; resolved logs whose payload does not unpack into the typed
 * shape, or carries trailing bytes, come back as `skipped`. Neither throws.
 */
export class EventDecoder {
  constructor(private readonly table: DecodingTable) {}

  decode(log: RawLog): DecodeResult {
    const [selector, ...indexed] = log.topics;
    if (!selector) {
      return { status: "unresolved", selector: null };
    }

    const shape = this.table.resolve(log.address, selector);
    if (!shape) {
      return { status: "unresolved", selector };
    }

    if (shape.dataInputs.every(isSingleWord)) {
      const expected = 32 * shape.dataInputs.length;
      const actual = size(log.data);
      if (actual !== expected) {
        return {
          status: "skipped",
          error: new DecodeSkipError(shape.name, `payload is ${actual} bytes, expected ${expected}`),
        };
      }
    }

    let values: readonly unknown[];
    try {
      values = decodeAbiParameters(shape.dataInputs, log.data);
    } catch (error) {
      return {
        status: "skipped",
        error: new DecodeSkipError(shape.name, "payload does not match the event ABI", error),
      };
    }

    const fields = Object.fromEntries(
      shape.dataInputs.map((input, i) => [input.name ?? `arg${i}`, values[i]])
    );
    const body = eventBodySchema.safeParse({ name: shape.name, fields });
    if (!body.success) {
      const issue = body.error.issues[0];
      return {
        status: "skipped",
        error: new DecodeSkipError(
          shape.name,
          issue ? `${issue.path.join(".")}: ${issue.message}` : "payload failed validation",
          body.error
        ),
      };
    }

    return {
      status: "decoded",
      event: {
        ...body.data,
        contract: log.address.toLowerCase(),
        indexed,
        transactionHash: log.transactionHash,
        blockNumber: log.blockNumber,
        logIndex: log.logIndex,
      },
    };
  }
}
