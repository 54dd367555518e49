/** Signed power; positive means charging the battery or importing from the grid. */
export class Power {
  private readonly _watts: number;

  private constructor(watts: number) {
    if (!Number.isFinite(watts)) {
      throw new TypeError("Power requires a finite numeric value in watts");
    }
    this._watts = watts;
  }

  static fromWatts(value: number): Power {
    return new Power(value);
  }

  get watts(): number {
    return this._watts;
  }

  /** Clamp into [-maxOut, +maxIn]. */
  limit(maxIn: Power, maxOut: Power): Power {
    const upper = Math.abs(maxIn._watts);
    const lower = -Math.abs(maxOut._watts);
    return new Power(Math.min(Math.max(this._watts, lower), upper));
  }

  differsBy(other: Power, tolerance: Power): boolean {
    return Math.abs(this._watts - other._watts) >= Math.abs(tolerance._watts);
  }
}
