/**
 * Whole-command parsers for the envelope commands.
 *
 *   "MAIL FROM:" Reverse-path [ SP Mail-parameters ]
 *   "RCPT TO:" Forward-path [ SP Rcpt-parameters ]
 *
 * The command text must be given without its CRLF: no line terminator is
 * consumed or required, and any byte left over after the grammar is a
 * failure.
 */

import { esmtpParams } from "./esmtp-params.ts";
import { forwardPath, reversePath } from "./path.ts";
import { mailbox } from "./mailbox.ts";
import {
	exact,
	literal,
	literalNoCase,
	map,
	opt,
	pair,
	preceded,
	type Rule,
	toText,
} from "./scanner.ts";
import type { EsmtpParam, MailCommand, RcptCommand } from "./types.ts";

const paramSuffix: Rule<EsmtpParam[]> = map(
	opt(preceded(literal(" "), esmtpParams)),
	(params) => params ?? [],
);

const mailCommand: Rule<MailCommand> = map(
	pair(preceded(literalNoCase("MAIL FROM:"), reversePath), paramSuffix),
	([reversePath, params]): MailCommand => ({ reversePath, params }),
);

const rcptCommand: Rule<RcptCommand> = map(
	pair(preceded(literalNoCase("RCPT TO:"), forwardPath), paramSuffix),
	([path, params]): RcptCommand => ({ path, params }),
);

export function parseMailCommand(input: string | Uint8Array): MailCommand | false {
	return exact(mailCommand, toText(input));
}

export function parseRcptCommand(input: string | Uint8Array): RcptCommand | false {
	return exact(rcptCommand, toText(input));
}

/** True when the whole input is a `local-part@domain-part` mailbox. */
export function validateAddress(input: string | Uint8Array): boolean {
	return exact(mailbox, toText(input)) !== false;
}
