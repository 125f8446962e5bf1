/**
 * Command - one node of the command tree.
 *
 * A command holds either child commands or a single action, never both.
 * Filters wrap everything below the command they are registered on.
 */

import { CommandTreeError, ErrorCode } from "@flagroute/sdk";
import type { ActionInput, FilterInput, Flag } from "@flagroute/sdk";
import { createLogger } from "@flagroute/shared";
import { ActionBinding, FilterBinding } from "./binding.js";

const logger = createLogger("Command");

/** What a command needs from the app that owns its tree. */
export interface CommandHost {
  /** Called after every change to the tree. */
  refreshUsage(): void;
}

export class Command {
  private readonly children = new Map<string, Command>();
  private readonly filterList: FilterBinding[] = [];
  private action: ActionBinding | undefined;
  private cmdName: string;

  constructor(
    name: string,
    readonly description: string,
    readonly parent: Command | undefined,
    private readonly host: CommandHost | undefined,
  ) {
    this.cmdName = name;
  }

  get name(): string {
    return this.cmdName;
  }

  /** Used by the app to keep the root named after the program. */
  rename(name: string): void {
    this.cmdName = name;
  }

  // ─── Tree construction ───

  addSubcommand(name: string, description: string, ...filters: FilterInput[]): Command {
    if (this.action) {
      throw new CommandTreeError(
        this.pathString(),
        `action has been set, no subcommand can be set: ${JSON.stringify(this.pathString())}`,
        ErrorCode.ACTION_ALREADY_SET,
      );
    }
    if (name === "") {
      throw new CommandTreeError(this.pathString(), "command name is empty", ErrorCode.EMPTY_COMMAND_NAME);
    }
    if (this.children.has(name)) {
      throw new CommandTreeError(
        this.pathString(),
        `command named ${name} already exists`,
        ErrorCode.DUPLICATE_COMMAND,
      );
    }

    const child = new Command(name, description, this, this.host);
    for (const filter of filters) child.addFilter(filter);
    this.children.set(name, child);
    logger.debug(`Registered command: ${child.pathString()}`);
    this.host?.refreshUsage();
    return child;
  }

  addSubaction(name: string, description: string, action: ActionInput, ...filters: FilterInput[]): Command {
    const child = this.addSubcommand(name, description, ...filters);
    child.setAction(action);
    return child;
  }

  addFilter(filter: FilterInput): void {
    this.filterList.push(FilterBinding.from(filter, this.cmdName));
    this.host?.refreshUsage();
  }

  setAction(action: ActionInput): void {
    if (this.children.size > 0) {
      throw new CommandTreeError(
        this.pathString(),
        `some subcommands have been set, no action can be set: ${JSON.stringify(this.pathString())}`,
        ErrorCode.SUBCOMMANDS_PRESENT,
      );
    }
    if (this.action) {
      throw new CommandTreeError(
        this.pathString(),
        `action has already been set: ${JSON.stringify(this.pathString())}`,
        ErrorCode.ACTION_ALREADY_SET,
      );
    }
    this.action = ActionBinding.from(action, this.cmdName);
    this.host?.refreshUsage();
  }

  // ─── Inspection ───

  /** Names from the root down to this command. */
  path(): string[] {
    const names: string[] = [];
    for (let node: Command | undefined = this; node; node = node.parent) {
      names.unshift(node.name);
    }
    return names;
  }

  pathString(): string {
    return this.path().join(" ");
  }

  /** Child commands in name order. */
  subcommands(): Command[] {
    return [...this.children.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  subcommand(name: string): Command | undefined {
    return this.children.get(name);
  }

  hasAction(): boolean {
    return this.action !== undefined;
  }

  /** Option flags declared by the action's option object. */
  actionFlags(): Flag[] {
    return this.action?.flags() ?? [];
  }

  /** Option flags declared by this command's filters, in registration order. */
  filterFlags(): Flag[] {
    return this.filterList.flatMap((binding) => binding.flags());
  }

  filterBindings(): readonly FilterBinding[] {
    return this.filterList;
  }

  actionBinding(): ActionBinding | undefined {
    return this.action;
  }
}
