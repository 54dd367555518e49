export class EnergyPrice {
  private readonly _eurPerKwh: number;

  private constructor(eurPerKwh: number) {
    if (!Number.isFinite(eurPerKwh)) {
      throw new TypeError("EnergyPrice requires a finite value in EUR/kWh");
    }
    this._eurPerKwh = eurPerKwh;
  }

  static fromEurPerKwh(value: number): EnergyPrice {
    return new EnergyPrice(value);
  }

  get eurPerKwh(): number {
    return this._eurPerKwh;
  }

  get ctPerKwh(): number {
    return this._eurPerKwh * 100;
  }

  format(): string {
    return `${this.ctPerKwh.toFixed(2)} ct/kWh`;
  }
}
