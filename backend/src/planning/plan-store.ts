import { Injectable } from "@nestjs/common";

import type { PlanSnapshot } from "@wattplan/domain";

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Last published plan. Readers get an immutable snapshot; publishing swaps the
 * reference in one assignment so a reader never sees a half-written plan.
 */
@Injectable()
export class PlanStore {
  private current: PlanSnapshot | null = null;

  latest(): PlanSnapshot | null {
    return this.current;
  }

  publish(snapshot: PlanSnapshot): PlanSnapshot {
    const frozen = deepFreeze(structuredClone(snapshot));
    this.current = frozen;
    return frozen;
  }

  /** Re-publishes the current plan as degraded with the given errors appended. */
  markDegraded(messages: string[]): PlanSnapshot | null {
    if (!this.current) {
      return null;
    }
    return this.publish({
      ...structuredClone(this.current),
      status: "degraded",
      errors: [...this.current.errors, ...messages],
    });
  }
}
