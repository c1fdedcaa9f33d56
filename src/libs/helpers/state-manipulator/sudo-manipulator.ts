import Debug from "debug";

import { ToolError } from "../../../utils/base-tool.ts";
import type { StateLine, StateManipulator } from "./genesis-parser.ts";
import { SUDO_KEY } from "./storage-keys.ts";

const _debug = Debug("helper:sudo-manipulator");

// Keeps the sudo account of the base (dev) spec, whatever the forked chain had.
// An explicit account overrides the base one.
export class SudoManipulator implements StateManipulator {
  public readonly storageKey: string;
  private readonly sudoAccount: string | undefined;
  private baseSudoAccount: string | undefined;

  constructor(sudoAccount?: string) {
    this.storageKey = SUDO_KEY;
    this.sudoAccount = sudoAccount;
  }

  processRead = ({ key, value }: StateLine) => {
    if (key != this.storageKey) {
      return;
    }
    _debug(`Found base sudo key: ${value}`);
    this.baseSudoAccount = value;
  };

  prepareWrite = () => {
    if (this.sudoAccount === undefined && this.baseSudoAccount === undefined) {
      throw new ToolError(`Base chain spec has no sudo key (${this.storageKey})`);
    }
  };

  processWrite = ({ key }: StateLine) => {
    if (key != this.storageKey) {
      return;
    }
    return { action: "remove" as const };
  };

  finalLines = (): StateLine[] => {
    const value = this.sudoAccount ?? this.baseSudoAccount;
    if (value === undefined) {
      throw new ToolError(`Base chain spec has no sudo key (${this.storageKey})`);
    }
    return [{ key: this.storageKey, value }];
  };
}
