import { readFile } from "fs/promises";
import { z } from "zod";
import { toEventSelector, type AbiEvent, type AbiParameter, type Address, type Hex } from "viem";
import { ConfigError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { expectedFields, isEventName, type EventName } from "../types/events";

const log = createLogger("DecodingTable");

const abiParameterSchema = z
  .object({
    name: z.string().default(""),
    type: z.string(),
    indexed: z.boolean().optional(),
  })
  .passthrough();

const abiItemSchema = z
  .object({
    type: z.string(),
    name: z.string().optional(),
    inputs: z.array(abiParameterSchema).optional(),
    anonymous: z.boolean().optional(),
  })
  .passthrough();

// Bare ABI array, or a build artifact carrying it under `abi`
const abiFileSchema = z.union([
  z.array(abiItemSchema),
  z.object({ abi: z.array(abiItemSchema) }).transform((artifact) => artifact.abi),
]);

export type AbiDefinition = z.infer<typeof abiFileSchema>;

/**
 * A contract whose events are watched
 */
export interface WatchedContract {
  label: string;
  address: Address;
  abi: AbiDefinition;
}

/**
 * A watched contract whose ABI lives in a JSON file
 */
export interface WatchedContractSource {
  label: string;
  address: Address;
  abiPath: string;
}

/**
 * Typed event shape an (address, selector) pair resolves to
 */
export interface EventShape {
  name: EventName;
  contractLabel: string;
  selector: Hex;
  indexedInputs: readonly AbiParameter[];
  dataInputs: readonly AbiParameter[];
}

const tableKey = (address: string, selector: string): string =>
  `${address.toLowerCase()}:${selector.toLowerCase()}`;

/**
 * Static mapping from (contract address, event selector) to a typed event shape.
 * Built once at startup.
 */
export class DecodingTable {
  private readonly entries = new Map<string, EventShape>();
  private readonly watched: Address[] = [];
  /** `<label>.<event>` of ABI events with no typed shape */
  readonly skippedEvents: string[] = [];

  static fromContracts(contracts: readonly WatchedContract[]): DecodingTable {
    const table = new DecodingTable();
    for (const contract of contracts) {
      table.register(contract);
    }
    return table;
  }

  private register(contract: WatchedContract): void {
    const address = contract.address.toLowerCase();
    if (!this.watched.some((watched) => watched.toLowerCase() === address)) {
      this.watched.push(contract.address);
    }

    for (const item of contract.abi) {
      if (item.type !== "event" || !item.name || item.anonymous) continue;

      if (!isEventName(item.name)) {
        this.skippedEvents.push(`${contract.label}.${item.name}`);
        continue;
      }

      const inputs: AbiParameter[] = (item.inputs ?? []).map((input) => ({
        name: input.name,
        type: input.type,
      }));
      const indexedFlags = (item.inputs ?? []).map((input) => input.indexed === true);
      const abiEvent: AbiEvent = {
        type: "event",
        name: item.name,
        inputs: inputs.map((input, i) => ({ ...input, indexed: indexedFlags[i] })),
      };

      const dataInputs = inputs.filter((_, i) => !indexedFlags[i]);
      const indexedInputs = inputs.filter((_, i) => indexedFlags[i]);

      const expected = expectedFields(item.name);
      const actual = dataInputs.map((input) => input.name ?? "");
      const sameFields =
        expected.length === actual.length && expected.every((field) => actual.includes(field));
      if (!sameFields) {
        throw new ConfigError([
          `${contract.label}.${item.name}: ABI payload fields [${actual.join(", ")}] do not match [${expected.join(", ")}]`,
        ]);
      }

      const selector = toEventSelector(abiEvent);
      this.entries.set(tableKey(address, selector), {
        name: item.name,
        contractLabel: contract.label,
        selector,
        indexedInputs,
        dataInputs,
      });
    }
  }

  /**
   * Look up the event shape for a log's emitter and first topic
   */
  resolve(address: string, selector: string): EventShape | undefined {
    return this.entries.get(tableKey(address, selector));
  }

  /**
   * Addresses of every watched contract, in registration order
   */
  addresses(): Address[] {
    return [...this.watched];
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Parse an ABI JSON document (bare array or artifact)
 */
export function parseAbiDefinition(raw: unknown, source: string): AbiDefinition {
  const parsed = abiFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError([`${source}: not an ABI (${parsed.error.issues[0]?.message ?? "invalid"})`]);
  }
  return parsed.data;
}

/**
 * Read every watched contract's ABI file and build the decoding table
 */
export async function loadDecodingTable(
  sources: readonly WatchedContractSource[]
): Promise<DecodingTable> {
  const contracts: WatchedContract[] = [];

  for (const source of sources) {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(source.abiPath, "utf8"));
    } catch (error) {
      throw new ConfigError([
        `${source.label}: failed to read ABI from ${source.abiPath} (${error instanceof Error ? error.message : String(error)})`,
      ]);
    }
    contracts.push({
      label: source.label,
      address: source.address,
      abi: parseAbiDefinition(raw, source.abiPath),
    });
  }

  const table = DecodingTable.fromContracts(contracts);
  log.info(
    { events: table.size, contracts: contracts.length, skipped: table.skippedEvents },
    "Decoding table loaded"
  );
  return table;
}
