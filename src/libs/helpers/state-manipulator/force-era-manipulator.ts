import Debug from "debug";

import { FORCE_NONE } from "../../../utils/constants.ts";
import type { StateLine, StateManipulator } from "./genesis-parser.ts";
import { FORCE_ERA_KEY } from "./storage-keys.ts";

const _debug = Debug("helper:force-era-manipulator");

// Prevents the validator set from rotating mid-test (Staking.ForceEra = ForceNone)
export class ForceEraManipulator implements StateManipulator {
  private readonly storageKey: string;
  private readonly forcing: string;

  constructor(forcing: string = FORCE_NONE) {
    this.storageKey = FORCE_ERA_KEY;
    this.forcing = forcing;
  }

  processRead = (_: StateLine) => {};

  prepareWrite = () => {};

  processWrite = ({ key, value }: StateLine) => {
    if (key != this.storageKey) {
      return;
    }
    _debug(`Replacing Staking.ForceEra ${value} by ${this.forcing}`);
    return { action: "remove" as const };
  };

  finalLines = (): StateLine[] => [{ key: this.storageKey, value: this.forcing }];
}
