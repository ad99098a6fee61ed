/**
 * Head-to-head parsing benchmark.
 *
 * Compares the typed grammar (parseMailCommand / parseRcptCommand) with the
 * flat session adapter built on top of it (parseAddressCommand), over the
 * same mix of envelope commands a busy MTA sees.
 *
 *   npm run bench
 */

import { bench, describe } from "vitest";
import { parseAddressCommand } from "../src/address-parser.ts";
import { parseMailCommand, parseRcptCommand } from "../src/commands.ts";

// ---- Command payloads -------------------------------------------------------

const MAIL_LINES = [
	"MAIL FROM:<sender@benchmark.test>",
	"MAIL FROM:<> BODY=8BITMIME",
	"MAIL FROM:<first.last+tag@mail.benchmark.test> SIZE=12345 BODY=8BITMIME SMTPUTF8",
	'MAIL FROM:<"quoted \\"user\\""@[192.0.2.1]> RET=HDRS ENVID=QQ314159',
	"MAIL FROM:<@relay.benchmark.test:bounce@benchmark.test>",
];

const RCPT_LINES = [
	"RCPT TO:<recipient@benchmark.test>",
	"RCPT TO:<postmaster>",
	"RCPT TO:<a@[IPv6:2001:db8::1]> NOTIFY=SUCCESS,FAILURE ORCPT=rfc822;a@benchmark.test",
	"RCPT TO:<broken@@benchmark.test>",
];

describe("MAIL FROM", () => {
	bench("parseMailCommand", () => {
		for (const line of MAIL_LINES) parseMailCommand(line);
	});

	bench("parseAddressCommand", () => {
		for (const line of MAIL_LINES) parseAddressCommand("MAIL FROM", line);
	});
});

describe("RCPT TO", () => {
	bench("parseRcptCommand", () => {
		for (const line of RCPT_LINES) parseRcptCommand(line);
	});

	bench("parseAddressCommand", () => {
		for (const line of RCPT_LINES) parseAddressCommand("RCPT TO", line);
	});
});
