/**
 * Flat MAIL FROM / RCPT TO parsing for session code.
 *
 * Input examples:
 *   "MAIL FROM:<user@example.com> BODY=8BITMIME SIZE=12345"
 *   "RCPT TO:<postmaster> NOTIFY=SUCCESS,FAILURE"
 *
 * Runs the strict command grammar, then applies the RFC 5321 size limits
 * and folds the parameters into a keyword → value record.
 * Returns { address, args } or false if parsing fails.
 */

import { parseMailCommand, parseRcptCommand } from "./commands.ts";
import { decodeXtext } from "./dsn.ts";
import { formatLocalPart, formatMailbox } from "./format.ts";
import type {
	AddressCommandOptions,
	EsmtpParam,
	Mailbox,
	SMTPAddress,
	SMTPAddressArgs,
} from "./types.ts";

const DEFAULT_OPTIONS: Readonly<Required<AddressCommandOptions>> = Object.freeze({
	maxLocalPartLength: 64,
	maxPathLength: 254,
	decodeXtext: true,
});

function toArgs(params: readonly EsmtpParam[], decode: boolean): SMTPAddressArgs | false {
	if (params.length === 0) return false;
	const args: SMTPAddressArgs = {};
	for (const { name, value } of params) {
		// a later duplicate wins
		args[name.toUpperCase()] = value === null ? true : decode ? decodeXtext(value) : value;
	}
	return args;
}

function withinLimits(mailbox: Mailbox, opts: Readonly<Required<AddressCommandOptions>>): boolean {
	const local = formatLocalPart(mailbox.local);
	// RFC 5321 §4.5.3.1.1: local part max 64 octets
	if (local.length > opts.maxLocalPartLength) return false;
	// RFC 5321 §4.5.3.1.3: path limit 254 octets (local + @ + domain)
	return formatMailbox(mailbox).length <= opts.maxPathLength;
}

/**
 * @param name  Expected prefix ("MAIL FROM" or "RCPT TO"), case-insensitive
 * @param command  Full command line without CRLF, e.g. "MAIL FROM:<user@domain> SIZE=1234"
 */
export function parseAddressCommand(
	name: string,
	command: string,
	options: AddressCommandOptions = {},
): SMTPAddress | false {
	const opts = { ...DEFAULT_OPTIONS, ...options };
	const line = command.trim();

	let mailbox: Mailbox | null;
	let address: string;
	let params: readonly EsmtpParam[];

	switch (name.trim().toUpperCase()) {
		case "MAIL FROM": {
			const parsed = parseMailCommand(line);
			if (!parsed) return false;
			mailbox = parsed.reversePath.kind === "mailbox" ? parsed.reversePath.mailbox : null;
			// Bounce address is allowed: empty string from "<>"
			address = "";
			params = parsed.params;
			break;
		}
		case "RCPT TO": {
			const parsed = parseRcptCommand(line);
			if (!parsed) return false;
			mailbox = parsed.path.kind === "mailbox" ? parsed.path.mailbox : null;
			address = "postmaster";
			params = parsed.params;
			break;
		}
		default:
			return false;
	}

	if (mailbox) {
		if (!withinLimits(mailbox, opts)) return false;
		address = formatMailbox(mailbox);
	}

	return { address, args: toArgs(params, opts.decodeXtext) };
}
