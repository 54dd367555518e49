import { Injectable, Logger } from "@nestjs/common";

import type { ControlState } from "@wattplan/domain";

export type DeviceCommand =
  | { kind: "power"; watts: number }
  | { kind: "self_consumption" }
  | { kind: "none" };

export function describeCommand(command: DeviceCommand): string {
  switch (command.kind) {
    case "power":
      return `POWER ${Math.round(command.watts)} W`;
    case "self_consumption":
      return "SELF_CONSUMPTION";
    case "none":
      return "NONE";
  }
}

@Injectable()
export class SetpointTranslator {
  private readonly logger = new Logger(SetpointTranslator.name);
  private lastCommand: DeviceCommand | null = null;

  fromControlState(state: ControlState): DeviceCommand {
    if (state.inert) {
      return {kind: "self_consumption"};
    }
    if (state.effective_mode.kind === "manual") {
      return {kind: "none"};
    }
    return {kind: "power", watts: Math.round(state.target_power_w)};
  }

  /** Dry-run sink: logs the command when it changes. */
  apply(state: ControlState): DeviceCommand {
    const command = this.fromControlState(state);
    if (!this.lastCommand || describeCommand(this.lastCommand) !== describeCommand(command)) {
      this.logger.log(`Device command: ${describeCommand(command)}`);
    } else {
      this.logger.verbose(`Device command unchanged: ${describeCommand(command)}`);
    }
    this.lastCommand = command;
    return command;
  }
}
