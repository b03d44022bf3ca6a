const SUBUNITS_PER_UNIT = 100;

/**
 * Price of one kWh, stored in the main currency unit (SEK, EUR).
 * Subunits are öre or cents.
 */
export class EnergyPrice {
  private readonly perKwhValue: number;

  private constructor(perKwh: number) {
    if (!Number.isFinite(perKwh)) {
      throw new TypeError("EnergyPrice requires a finite numeric value expressed per kWh");
    }
    this.perKwhValue = perKwh;
  }

  static fromPerKwh(value: number): EnergyPrice {
    return new EnergyPrice(value);
  }

  static fromSubunitsPerKwh(value: number): EnergyPrice {
    return new EnergyPrice(value / SUBUNITS_PER_UNIT);
  }

  get perKwh(): number {
    return this.perKwhValue;
  }

  get subunitsPerKwh(): number {
    return this.perKwhValue * SUBUNITS_PER_UNIT;
  }

  toJSON(): number {
    return this.perKwhValue;
  }

  /**
   * All-in price for a spot price: the fee's pre-VAT share is added to the spot price
   * and VAT is applied to the sum, so the fee comes back out exactly.
   *
   * @param feeSubunits supplier fee per kWh including VAT, in subunits
   * @param vatMultiplier e.g. 1.25 for 25 % VAT
   */
  withVatInclusiveFee(feeSubunits: number, vatMultiplier: number): EnergyPrice {
    if (!Number.isFinite(vatMultiplier) || vatMultiplier <= 0) {
      throw new RangeError("VAT multiplier must be a positive number");
    }
    const beforeVat = this.subunitsPerKwh + feeSubunits / vatMultiplier;
    return EnergyPrice.fromSubunitsPerKwh(beforeVat * vatMultiplier);
  }
}
