export class Percentage {
  private readonly _ratio: number;

  private constructor(ratio: number) {
    this._ratio = Percentage.normalize(ratio);
  }

  static fromPercent(value: number): Percentage {
    return new Percentage(value / 100);
  }

  static fromRatio(value: number): Percentage {
    return new Percentage(value);
  }

  get ratio(): number {
    return this._ratio;
  }

  get percent(): number {
    return this._ratio * 100;
  }

  of(total: number): number {
    return total * this._ratio;
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
