/**
 * Usage text for an App.
 *
 * The app collects UsageData on every change to its tree or metadata and
 * hands it to a UsageRenderer; the rendered text is cached.
 */

import type { Author } from "@flagroute/sdk";
import { formatFlagDefaults } from "../flags/usage.js";
import type { Command } from "./command.js";

export interface UsageCommand {
  /** Path below the root, e.g. "remote add". */
  readonly path: string;
  readonly description: string;
  /** Rendered option defaults, "" when the command takes none. */
  readonly options: string;
}

export interface UsageData {
  readonly cmdName: string;
  readonly name: string;
  readonly description: string;
  readonly version: string;
  readonly compiled: Date;
  readonly authors: readonly Author[];
  readonly copyright: string;
  /** Commands that carry an action, in path order. */
  readonly commands: readonly UsageCommand[];
  /** Rendered options of the root's filters and action. */
  readonly globalOptions: string;
}

export type UsageRenderer = (data: UsageData) => string;

export function formatAuthor(author: Author): string {
  return author.email ? `${author.name} <${author.email}>` : author.name;
}

/** Leaf commands below root, depth first in name order. */
export function collectCommands(root: Command): UsageCommand[] {
  const commands: UsageCommand[] = [];
  const visit = (cmd: Command): void => {
    for (const child of cmd.subcommands()) {
      if (child.hasAction()) {
        commands.push({
          path: child.path().slice(1).join(" "),
          description: child.description,
          options: formatFlagDefaults([...child.filterFlags(), ...child.actionFlags()]),
        });
      }
      visit(child);
    }
  };
  visit(root);
  return commands;
}

function indent(text: string, prefix: string): string {
  return text
    .split("\n")
    .map((line) => prefix + line)
    .join("\n");
}

function renderCommand(cmdName: string, command: UsageCommand): string {
  const head = command.description
    ? `  ${cmdName} ${command.path} # ${command.description}`
    : `  ${cmdName} ${command.path}`;
  return command.options ? `${head}\n${indent(command.options.trimEnd(), "  ")}` : head;
}

export const defaultUsageRenderer: UsageRenderer = (data) => {
  const sections: string[] = [];
  const title = data.name || data.cmdName;
  sections.push(data.version ? `${title} - v${data.version}` : title);
  if (data.description) sections.push(data.description);

  let usage = `USAGE:\n  ${data.cmdName}`;
  if (data.globalOptions) usage += " [-globaloptions --]";
  if (data.commands.length > 0) usage += " [command] [-commandoptions]";
  sections.push(usage);

  if (data.commands.length > 0) {
    sections.push(["COMMANDS:", ...data.commands.map((command) => renderCommand(data.cmdName, command))].join("\n"));
  }
  if (data.globalOptions) {
    sections.push(`GLOBAL OPTIONS:\n${data.globalOptions.trimEnd()}`);
  }
  if (data.authors.length > 0) {
    const heading = data.authors.length === 1 ? "AUTHOR:" : "AUTHORS:";
    sections.push([heading, ...data.authors.map((author) => `  ${formatAuthor(author)}`)].join("\n"));
  }
  if (data.copyright) {
    sections.push(`COPYRIGHT:\n  ${data.copyright}`);
  }
  return `${sections.join("\n\n")}\n`;
};
