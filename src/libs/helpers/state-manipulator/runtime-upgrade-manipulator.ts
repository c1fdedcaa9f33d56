import Debug from "debug";

import type { StateLine, StateManipulator } from "./genesis-parser.ts";
import { LAST_RUNTIME_UPGRADE_KEY } from "./storage-keys.ts";

const _debug = Debug("helper:runtime-upgrade-manipulator");

// Without System.LastRuntimeUpgrade the fork believes the runtime was never
// upgraded, so on_runtime_upgrade hooks run on its first block.
// Nothing to do when the key is already missing.
export class RuntimeUpgradeManipulator implements StateManipulator {
  private readonly storageKey: string;

  constructor() {
    this.storageKey = LAST_RUNTIME_UPGRADE_KEY;
  }

  processRead = (_: StateLine) => {};

  prepareWrite = () => {};

  processWrite = ({ key, value }: StateLine) => {
    if (key != this.storageKey) {
      return;
    }
    _debug(`Removing System.LastRuntimeUpgrade: ${value}`);
    return { action: "remove" as const };
  };
}
