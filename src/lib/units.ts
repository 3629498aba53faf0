import { formatUnits } from 'viem';

/**
 * Fixed-point scale of the collateral and debt amounts emitted for one asset
 */
export interface DecimalScale {
  collateral: number;
  debt: number;
}

/**
 * Per-asset decimal scale lookup. Assets without an override use the defaults.
 */
export class DecimalScales {
  private readonly overrides: Map<string, Partial<DecimalScale>>;

  constructor(
    private readonly defaults: DecimalScale,
    overrides: Record<string, Partial<DecimalScale>> = {}
  ) {
    this.overrides = new Map(
      Object.entries(overrides).map(([asset, scale]) => [asset.toLowerCase(), scale])
    );
  }

  forAsset(asset: string): DecimalScale {
    const override = this.overrides.get(asset.toLowerCase());
    return {
      collateral: override?.collateral ?? this.defaults.collateral,
      debt: override?.debt ?? this.defaults.debt,
    };
  }
}

/**
 * Convert a fixed-point integer into a decimal number
 */
export function toDecimal(value: bigint, decimals: number): number {
  return Number(formatUnits(value, decimals));
}
