import { z } from "zod";
import { createLedgerClient } from "../config/blockchain";
import { getWatchedContracts } from "../config/contracts";
import { getIndexerConfig } from "../config/env";
import { createLogger, errorMessage } from "../lib/logger";
import { loadDecodingTable } from "../services/DecodingTable";
import { fromPublicClient, LogFetcher } from "../services/LogFetcher";
import { surveySignatures } from "../services/SignatureSurvey";

const log = createLogger("surveySignatures");

const argsSchema = z
  .tuple([z.coerce.bigint().nonnegative(), z.coerce.bigint().nonnegative()])
  .refine(([from, to]) => to >= from, "toBlock must not be below fromBlock");

/**
 * Usage: surveySignatures <fromBlock> <toBlock>
 *
 * Fetches every log in the range, across all contracts, and reports which
 * event signatures appear and whether the decoding table knows them.
 */
async function main(argv: string[]): Promise<void> {
  const args = argsSchema.safeParse(argv);
  if (!args.success) {
    log.error({ issues: args.error.issues.map((issue) => issue.message) }, "Usage: surveySignatures <fromBlock> <toBlock>");
    process.exitCode = 1;
    return;
  }
  const [fromBlock, toBlock] = args.data;

  const config = getIndexerConfig();
  const table = await loadDecodingTable(getWatchedContracts(config));
  const fetcher = new LogFetcher(fromPublicClient(createLedgerClient(config)), []);

  const logs = await fetcher.fetchRange(fromBlock, toBlock);
  const summaries = surveySignatures(logs, table);

  log.info(
    { fromBlock: fromBlock.toString(), toBlock: toBlock.toString(), logs: logs.length, signatures: summaries.length },
    "Signature survey complete"
  );
  for (const summary of summaries) {
    log.info(summary, summary.eventName ?? "unknown signature");
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((error) => {
    log.fatal({ error: errorMessage(error) }, "Signature survey failed");
    process.exit(1);
  });
}
