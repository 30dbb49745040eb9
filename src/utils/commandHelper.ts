/** Command parsing utilities */

import type { Context } from "telegraf";

/**
 * Words after the command name, e.g. `/ban @bob 2d spam` -> ["@bob", "2d", "spam"]
 * Empty when the update carries no text.
 */
export function getCommandArgs(ctx: Context): string[] {
	if (!ctx.message || !("text" in ctx.message)) {
		return [];
	}
	return ctx.message.text.trim().split(/\s+/).slice(1);
}

/** Joins the remaining words into a reason, or null when there are none */
export function joinReason(args: string[]): string | null {
	const reason = args.join(" ").trim();
	return reason.length > 0 ? reason : null;
}

/** Parses a positive integer id argument such as `12` or `#12` */
export function parseIdArg(arg: string | undefined): number | null {
	if (!arg) {
		return null;
	}
	const match = /^#?(\d+)$/.exec(arg);
	if (!match) {
		return null;
	}
	const id = parseInt(match[1], 10);
	return id > 0 ? id : null;
}
