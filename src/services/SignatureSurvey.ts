import type { RawLog } from "../types/events";
import type { DecodingTable } from "./DecodingTable";

export interface SignatureSummary {
  selector: string;
  count: number;
  /** Lowercased emitters, in order of first appearance */
  emitters: string[];
  /** Typed event name when the table resolves at least one emitter */
  eventName: string | null;
  /** Logs the table would decode */
  resolvedCount: number;
}

/**
 * Group logs by their first topic, most frequent first
 */
export function surveySignatures(logs: readonly RawLog[], table: DecodingTable): SignatureSummary[] {
  const summaries = new Map<string, SignatureSummary>();

  for (const entry of logs) {
    const [topic0] = entry.topics;
    if (!topic0) continue;

    const selector = topic0.toLowerCase();
    const summary: SignatureSummary = summaries.get(selector) ?? {
      selector,
      count: 0,
      emitters: [],
      eventName: null,
      resolvedCount: 0,
    };

    summary.count++;
    const emitter = entry.address.toLowerCase();
    if (!summary.emitters.includes(emitter)) {
      summary.emitters.push(emitter);
    }

    const shape = table.resolve(entry.address, selector);
    if (shape) {
      summary.resolvedCount++;
      summary.eventName = shape.name;
    }

    summaries.set(selector, summary);
  }

  return [...summaries.values()].sort((a, b) => b.count - a.count || a.selector.localeCompare(b.selector));
}
