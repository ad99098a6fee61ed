/**
 * Path forms of the MAIL FROM and RCPT TO arguments.
 *
 *   Path         = "<" [ A-d-l ":" ] Mailbox ">"
 *   A-d-l        = At-domain *( "," At-domain )
 *   Reverse-path = Path / "<>"
 *   Forward-path = "<postmaster>" (any case) / Path
 *
 * The A-d-l source route is legacy syntax: it must be well formed but is
 * dropped from the result.
 */

import { domain, mailbox } from "./mailbox.ts";
import {
	alt,
	delimited,
	literal,
	literalNoCase,
	map,
	opt,
	pair,
	preceded,
	type Rule,
	separated1,
	terminated,
} from "./scanner.ts";
import type { Mailbox, Path, ReversePath } from "./types.ts";

const atDomain = preceded(literal("@"), domain);

export const sourceRoute: Rule<string[]> = separated1(atDomain, literal(","));

export const path: Rule<Mailbox> = delimited(
	literal("<"),
	map(pair(opt(terminated(sourceRoute, literal(":"))), mailbox), ([, box]) => box),
	literal(">"),
);

export const reversePath: Rule<ReversePath> = alt<ReversePath>(
	map(literal("<>"), (): ReversePath => ({ kind: "null" })),
	map(path, (box): ReversePath => ({ kind: "mailbox", mailbox: box })),
);

export const forwardPath: Rule<Path> = alt<Path>(
	map(literalNoCase("<postmaster>"), (): Path => ({ kind: "postmaster" })),
	map(path, (box): Path => ({ kind: "mailbox", mailbox: box })),
);
