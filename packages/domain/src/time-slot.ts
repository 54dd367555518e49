import { Duration } from "./duration";

export class TimeSlot {
  private readonly _start: Date;
  private readonly _end: Date;

  private constructor(start: Date, end: Date) {
    if (Number.isNaN(start.getTime())) {
      throw new TypeError("Invalid start date for time slot");
    }
    if (Number.isNaN(end.getTime())) {
      throw new TypeError("Invalid end date for time slot");
    }
    if (end.getTime() <= start.getTime()) {
      throw new RangeError("Time slot end must be after start");
    }
    this._start = new Date(start.getTime());
    this._end = new Date(end.getTime());
  }

  static fromStartAndDuration(start: Date, duration: Duration): TimeSlot {
    return new TimeSlot(start, new Date(start.getTime() + duration.milliseconds));
  }

  /** The `index`-th slot of a grid of `step`-long slots beginning at `origin`. */
  static nth(origin: Date, step: Duration, index: number): TimeSlot {
    const start = new Date(origin.getTime() + step.milliseconds * index);
    return TimeSlot.fromStartAndDuration(start, step);
  }

  get start(): Date {
    return new Date(this._start.getTime());
  }

  get end(): Date {
    return new Date(this._end.getTime());
  }
}
