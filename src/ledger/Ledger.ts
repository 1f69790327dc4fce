import { GroupNotFoundError, InvalidNameError } from "../errors.js";
import { isValidName } from "../engine/targets.js";
import type { Currency, LedgerSnapshot } from "../types/index.js";
import { Group } from "./Group.js";

export const LEDGER_VERSION = "0.1.0";

export function emptySnapshot(): LedgerSnapshot {
  return { version: LEDGER_VERSION, groups: [], currentGroup: null };
}

/**
 * All groups of one ledger plus the group used when none is named.
 */
export class Ledger {
  private groups: Group[];
  private currentGroup: string | null;

  private constructor(groups: Group[], currentGroup: string | null) {
    this.groups = groups;
    this.currentGroup = currentGroup;
  }

  static fromSnapshot(snapshot: LedgerSnapshot): Ledger {
    return new Ledger(snapshot.groups.map((g) => Group.fromSnapshot(g)), snapshot.currentGroup);
  }

  toSnapshot(): LedgerSnapshot {
    return {
      version: LEDGER_VERSION,
      groups: this.groups.map((g) => g.toSnapshot()),
      currentGroup: this.currentGroup,
    };
  }

  groupNames(): string[] {
    return this.groups.map((g) => g.name);
  }

  current(): string | null {
    return this.currentGroup;
  }

  createGroup(name: string, members: string[], currency?: Currency): Group {
    if (!isValidName(name)) {
      throw new InvalidNameError(`'${name}' is not a valid group name`);
    }
    if (this.groups.some((g) => g.name === name)) {
      throw new InvalidNameError(`Group already exists: ${name}`);
    }

    const group = Group.create(name, members, currency);
    this.groups.push(group);
    this.currentGroup = name;
    return group;
  }

  /**
   * Resolve a group by name; without a name, the current group is used,
   * falling back to the first one.
   */
  getGroup(name?: string): Group {
    const group =
      name !== undefined
        ? this.groups.find((g) => g.name === name)
        : (this.groups.find((g) => g.name === this.currentGroup) ?? this.groups[0]);

    if (!group) {
      throw new GroupNotFoundError(`Could not find group '${name ?? this.currentGroup ?? "none"}'`);
    }
    return group;
  }

  select(name: string): Group {
    const group = this.getGroup(name);
    this.currentGroup = group.name;
    return group;
  }

  deleteGroup(name: string): void {
    const group = this.getGroup(name);
    this.groups = this.groups.filter((g) => g !== group);

    if (this.currentGroup === name) {
      this.currentGroup = null;
    }
  }
}
