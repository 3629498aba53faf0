import { defineChain, type Chain } from "viem";

/**
 * Chain definition for the ledger the trove contracts are deployed on
 */
export const buildLedgerChain = (chainId: number, name: string, rpcUrl: string): Chain =>
  defineChain({
    id: chainId,
    name,
    nativeCurrency: {
      decimals: 18,
      name: "Bitcoin",
      symbol: "BTC",
    },
    rpcUrls: {
      default: {
        http: [rpcUrl],
      },
    },
  });
