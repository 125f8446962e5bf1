/**
 * tokens command - show how the token grammar reads the arguments after "--".
 */

import { StatusCode } from "@flagroute/sdk";
import type { ActionFunc } from "@flagroute/sdk";
import { TERMINATOR, readFlagToken } from "@flagroute/core";

/** One line per token: `flag name=value`, `flag name`, `terminator`, `positional raw` or `bad raw`. */
export function classifyTokens(args: readonly string[]): string[] {
  const lines: string[] = [];
  let cursor = args;
  while (cursor.length > 0) {
    const read = readFlagToken(cursor);
    switch (read.type) {
      case "end":
        lines.push(`positional ${cursor[0]}`);
        cursor = cursor.slice(1);
        break;
      case "terminator":
        lines.push("terminator");
        cursor = read.rest;
        break;
      case "flag":
        lines.push(read.value === undefined ? `flag ${read.name}` : `flag ${read.name}=${read.value}`);
        cursor = read.rest;
        break;
      case "bad":
        lines.push(`bad ${read.token}`);
        cursor = cursor.slice(1);
        break;
    }
  }
  return lines;
}

export const tokensAction: ActionFunc = (ctx) => {
  const args = ctx.args();
  const at = args.indexOf(TERMINATOR);
  if (at < 0) {
    ctx.throwStatus(StatusCode.BadArgs, "usage: tokens -- <args...>");
  }
  for (const line of classifyTokens(args.slice(at + 1))) {
    console.log(line);
  }
};
