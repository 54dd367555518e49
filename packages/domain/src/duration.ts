const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 3_600_000;

export class Duration {
  private readonly _milliseconds: number;

  private constructor(milliseconds: number) {
    if (!Number.isFinite(milliseconds) || milliseconds < 0) {
      throw new RangeError("Duration requires a finite, non-negative number of milliseconds");
    }
    this._milliseconds = milliseconds;
  }

  static fromSeconds(value: number): Duration {
    return new Duration(value * 1000);
  }

  static fromMinutes(value: number): Duration {
    return new Duration(value * MS_PER_MINUTE);
  }

  static fromHours(value: number): Duration {
    return new Duration(value * MS_PER_HOUR);
  }

  static between(start: Date, end: Date): Duration {
    return new Duration(Math.max(0, end.getTime() - start.getTime()));
  }

  get milliseconds(): number {
    return this._milliseconds;
  }

  get minutes(): number {
    return this._milliseconds / MS_PER_MINUTE;
  }

  get hours(): number {
    return this._milliseconds / MS_PER_HOUR;
  }
}
