/**
 * Route resolution - walks the command tree for one argument list.
 *
 * At each level the filters parse the level's argument list independently;
 * the shortest remainder among them becomes the list the next level sees.
 * An action ends the walk. Otherwise the next bare token names a child.
 */

import { Status, StatusCode, StatusError } from "@flagroute/sdk";
import type { ActionFunc, FilterFunc, OutputSink, ValidateFunc } from "@flagroute/sdk";
import { createLogger } from "@flagroute/shared";
import { splitArgs } from "../flags/token.js";
import type { Command } from "./command.js";

const logger = createLogger("router");

/** Tokens that ask for the usage text where a command name is expected. */
export const HELP_TOKENS: ReadonlySet<string> = new Set(["-h", "-help", "--help"]);

export interface RouteEnv {
  readonly validator: ValidateFunc | undefined;
  readonly notFound: ActionFunc | undefined;
  readonly output: OutputSink;
  readonly usageText: () => string;
}

export interface Route {
  /** The action wrapped by every filter on the path, outermost first. */
  readonly handler: ActionFunc;
  readonly cmdPath: string[];
  /** False when the handler is the not-found or help handler. */
  readonly found: boolean;
}

interface Walk {
  readonly filters: FilterFunc[];
  readonly action: ActionFunc;
  readonly cmdPath: string[];
  readonly found: boolean;
}

function buildFilters(cmd: Command, args: readonly string[], env: RouteEnv): [FilterFunc[], readonly string[]] {
  const filters: FilterFunc[] = [];
  let next = args;
  for (const binding of cmd.filterBindings()) {
    const instance = binding.instantiate(args, env);
    filters.push(instance.filter);
    if (instance.nextArgs && instance.nextArgs.length < next.length) {
      next = instance.nextArgs;
    }
  }
  return [filters, next];
}

function walk(cmd: Command, cmdPath: string[], args: readonly string[], env: RouteEnv): Walk {
  const [filters, rest] = buildFilters(cmd, args, env);

  const action = cmd.actionBinding();
  if (action) {
    return { filters, action: action.instantiate(rest, env), cmdPath, found: true };
  }

  const [name, tail] = splitArgs(rest);
  if (name === undefined && tail.length > 0 && HELP_TOKENS.has(tail[0]) && !env.notFound) {
    return {
      filters: [],
      action: () => {
        env.output.write(env.usageText());
      },
      cmdPath,
      found: false,
    };
  }

  const nextPath = name === undefined ? cmdPath : [...cmdPath, name];
  const child = name === undefined ? undefined : cmd.subcommand(name);
  if (!child) {
    logger.debug("command not found", { path: nextPath.join(" ") });
    if (env.notFound) {
      return { filters: [], action: env.notFound, cmdPath: nextPath, found: false };
    }
    throw new StatusError(
      Status.withStack(StatusCode.NotFound, "", `not found command action: ${JSON.stringify(nextPath.join(" "))}`),
    );
  }

  const sub = walk(child, nextPath, tail, env);
  if (!sub.found) return sub;
  return { ...sub, filters: [...filters, ...sub.filters] };
}

/**
 * Resolve args against the tree under root. Parse and validation failures
 * and unknown commands are thrown as StatusError.
 */
export function resolveRoute(root: Command, env: RouteEnv, cmdPath: readonly string[], args: readonly string[]): Route {
  const result = walk(root, [...cmdPath], args, env);
  if (result.found) {
    logger.debug("resolved command", { path: result.cmdPath.join(" "), filters: result.filters.length });
  }
  const handler = result.filters.reduceRight<ActionFunc>(
    (next, filter) => (ctx) => filter(ctx, next),
    result.action,
  );
  return { handler, cmdPath: result.cmdPath, found: result.found };
}
