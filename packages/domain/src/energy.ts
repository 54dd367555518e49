export class Energy {
  private readonly _wattHours: number;

  private constructor(wattHours: number) {
    if (!Number.isFinite(wattHours)) {
      throw new TypeError("Energy requires a finite numeric value in watt-hours");
    }
    this._wattHours = wattHours;
  }

  static fromKilowattHours(value: number): Energy {
    return new Energy(value * 1000);
  }

  get wattHours(): number {
    return this._wattHours;
  }
}
