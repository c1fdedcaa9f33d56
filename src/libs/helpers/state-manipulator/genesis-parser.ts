import Debug from "debug";
import chalk from "chalk";

import type { RawStorage } from "../../../utils/types.ts";

const debug = Debug("helper:state-manipulator");

// Represent the hex values of a given storage entry
export interface StateLine {
  key: string;
  value: string;
}

export type Action = "remove" | "keep";

// Manipulators go through 2 passes over the genesis storage:
// - read, over the base spec storage, before anything gets migrated
// - write, over the migrated storage, where each entry can be kept/removed
//   and replaced by extra entries
export interface StateManipulator {
  // Will get executed for each entry of the base storage during the read phase
  processRead: (line: StateLine) => void;

  // Will get executed after the read phase
  prepareWrite: () => void;

  // Will get executed for each entry of the migrated storage during the write phase
  processWrite: (line: StateLine) => { action: Action; extraLines?: StateLine[] } | undefined | void;

  // Entries added once every existing entry went through processWrite,
  // for keys that have to exist whether or not the storage had them
  finalLines?: () => StateLine[];
}

export function readStorage(storage: RawStorage, manipulators: StateManipulator[]): void {
  for (const [key, value] of Object.entries(storage)) {
    manipulators.forEach((manipulator) => {
      manipulator.processRead({ key, value });
    });
  }
  manipulators.forEach((manipulator) => {
    manipulator.prepareWrite();
  });
}

// Returns a new storage, the given one is left untouched
export function writeStorage(storage: RawStorage, manipulators: StateManipulator[]): RawStorage {
  const result: RawStorage = {};
  const extras: StateLine[] = [];

  for (const [key, value] of Object.entries(storage)) {
    let keepLine = true;
    for (const manipulator of manipulators) {
      const outcome = manipulator.processWrite({ key, value });
      if (!outcome) {
        continue;
      }
      const { action, extraLines } = outcome;
      debug(`      - ${chalk.red(action.padStart(6, " "))} ${key}: ${value.slice(0, 100)}`);
      if (action == "remove") {
        keepLine = false;
      }
      if (extraLines && extraLines.length > 0) {
        extras.push(...extraLines);
      }
    }
    if (keepLine) {
      result[key] = value;
    }
  }

  for (const manipulator of manipulators) {
    if (manipulator.finalLines) {
      extras.push(...manipulator.finalLines());
    }
  }

  for (const line of extras) {
    debug(`      - ${chalk.green("add".padStart(6, " "))} ${line.key}: ${line.value.slice(0, 100)}`);
    result[line.key] = line.value;
  }
  return result;
}
