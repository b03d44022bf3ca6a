export class Percentage {
  private readonly ratioValue: number;

  private constructor(ratio: number) {
    this.ratioValue = Percentage.normalize(ratio);
  }

  static fromPercent(value: number): Percentage {
    return new Percentage(value / 100);
  }

  static fromRatio(value: number): Percentage {
    return new Percentage(value);
  }

  /** Accepts either a ratio (0.857) or a percent (85.7). */
  static fromRatioOrPercent(value: number): Percentage {
    return value > 1 ? Percentage.fromPercent(value) : Percentage.fromRatio(value);
  }

  get ratio(): number {
    return this.ratioValue;
  }

  invert(): Percentage {
    return new Percentage(1 - this.ratioValue);
  }

  of(value: number): number {
    return value * this.ratioValue;
  }

  toJSON(): number {
    return this.ratioValue;
  }

  private static normalize(value: number): number {
    if (!Number.isFinite(value)) {
      throw new TypeError("Percentage requires a finite numeric value");
    }
    if (value < 0) {
      return 0;
    }
    if (value > 1) {
      return 1;
    }
    return value;
  }
}
