import { isAddress } from "viem";
import type { Position } from "../types/position";
import type { PriceOracleService, PriceObservation } from "./PriceOracleService";
import type { PositionGateway } from "./PositionGateway";

export interface AssetMetrics {
  asset: string;
  activePositions: number;
  totalCollateral: number;
  totalDebt: number;
  price: number | null;
  feedFrozen: boolean;
  collateralValue: number | null;
  /** Total collateralization ratio: collateral value over debt; 0 without debt */
  tcr: number | null;
}

export interface SystemMetrics {
  assets: AssetMetrics[];
  totalActivePositions: number;
  timestamp: string;
}

interface AssetTotals {
  activePositions: number;
  totalCollateral: number;
  totalDebt: number;
}

function totalsByAsset(positions: readonly Position[]): Map<string, AssetTotals> {
  const totals = new Map<string, AssetTotals>();
  for (const position of positions) {
    const current = totals.get(position.asset) ?? { activePositions: 0, totalCollateral: 0, totalDebt: 0 };
    current.activePositions++;
    current.totalCollateral += position.collateral;
    current.totalDebt += position.debt;
    totals.set(position.asset, current);
  }
  return totals;
}

/**
 * Aggregate system metrics over the persisted active positions, valued with
 * the oracle price of each asset.
 */
export class MetricsService {
  constructor(
    private readonly gateway: PositionGateway,
    private readonly oracle: PriceOracleService | null,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * @throws PriceUnavailableError when an asset's price cannot be read
   */
  async getMetrics(): Promise<SystemMetrics> {
    const positions = await this.gateway.listActive();
    const totals = [...totalsByAsset(positions)];

    // Prices are read concurrently; the first unavailable price rejects the lot
    const observations = await Promise.all(totals.map(([asset]) => this.observePrice(asset)));

    const assets = totals.map(([asset, assetTotals], i): AssetMetrics => {
      const observation = observations[i];
      const collateralValue = observation ? assetTotals.totalCollateral * observation.price : null;
      return {
        asset,
        ...assetTotals,
        price: observation?.price ?? null,
        feedFrozen: observation?.feedFrozen ?? false,
        collateralValue,
        tcr: collateralValue === null ? null : assetTotals.totalDebt > 0 ? collateralValue / assetTotals.totalDebt : 0,
      };
    });

    assets.sort((a, b) => a.asset.localeCompare(b.asset));

    return {
      assets,
      totalActivePositions: positions.length,
      timestamp: this.now().toISOString(),
    };
  }

  private async observePrice(asset: string): Promise<PriceObservation | null> {
    // No oracle configured, or the asset topic was missing from the events
    if (!this.oracle || !isAddress(asset, { strict: false })) {
      return null;
    }
    return this.oracle.readPrice(asset);
  }
}
