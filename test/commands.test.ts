import { describe, expect, test } from "vitest";
import { parseMailCommand, parseRcptCommand } from "../src/commands.ts";
import { parseEsmtpParams } from "../src/esmtp-params.ts";

const aAtExample = {
	kind: "mailbox",
	mailbox: {
		local: { kind: "atom", value: "a" },
		domain: { kind: "domain", value: "example.org" },
	},
};

describe("parseMailCommand", () => {
	test("null reverse-path", () => {
		expect(parseMailCommand("MAIL FROM:<>")).toEqual({ reversePath: { kind: "null" }, params: [] });
	});

	test("mailbox with parameters in order", () => {
		expect(parseMailCommand("MAIL FROM:<a@example.org> SIZE=1000 BODY=8BITMIME")).toEqual({
			reversePath: aAtExample,
			params: [
				{ name: "SIZE", value: "1000" },
				{ name: "BODY", value: "8BITMIME" },
			],
		});
	});

	test("null reverse-path with parameters", () => {
		expect(parseMailCommand("MAIL FROM:<> SMTPUTF8")).toEqual({
			reversePath: { kind: "null" },
			params: [{ name: "SMTPUTF8", value: null }],
		});
	});

	test("command keyword is case-insensitive", () => {
		expect(parseMailCommand("mail from:<a@example.org>")).toEqual({ reversePath: aAtExample, params: [] });
		expect(parseMailCommand("Mail From:<a@example.org>")).toEqual({ reversePath: aAtExample, params: [] });
	});

	test("parameter keywords keep their case", () => {
		expect(parseMailCommand("MAIL FROM:<a@example.org> size=10")).toMatchObject({
			params: [{ name: "size", value: "10" }],
		});
	});

	test("parameters may be separated by several SP/HTAB", () => {
		expect(parseMailCommand("MAIL FROM:<a@example.org> SIZE=1 \t BODY=7BIT")).toMatchObject({
			params: [
				{ name: "SIZE", value: "1" },
				{ name: "BODY", value: "7BIT" },
			],
		});
	});

	test("source route is matched and dropped", () => {
		expect(parseMailCommand("MAIL FROM:<@relay.one,@relay.two:a@example.org>")).toEqual({
			reversePath: aAtExample,
			params: [],
		});
	});

	test("quoted local part and address literal", () => {
		expect(parseMailCommand('MAIL FROM:<"john doe"@[IPv6:2001:db8::1]>')).toEqual({
			reversePath: {
				kind: "mailbox",
				mailbox: {
					local: { kind: "quoted", value: "john doe" },
					domain: { kind: "literal", literal: { kind: "ip", ip: { family: 6, address: "2001:db8::1" } } },
				},
			},
			params: [],
		});
	});

	test.each([
		"MAIL FROM:<a@b.com>extra",
		"MAIL FROM:<a@b.com> ext@ra",
		"MAIL FROM:<a@b.com> SIZE=1000 !!",
		"MAIL FROM:<a@b.com> ",
		"MAIL FROM:<a@b.com>\r\n",
		"MAIL FROM: <a@b.com>",
		"MAIL FROM:a@b.com",
		"MAIL FROM:<a@b.com",
		"MAIL FROM:<postmaster>",
		"MAIL FROM:<@relay.one:>",
		"MAIL FROM:<@relay.one a@b.com>",
		"MAIL FROM:<a@b.com> X=a=b",
		"MAIL FROM:<a@b.com> SIZE=",
		"MAIL  FROM:<a@b.com>",
		"RCPT TO:<a@b.com>",
		"",
	])("rejects %j", (input) => {
		expect(parseMailCommand(input)).toBe(false);
	});
});

describe("parseRcptCommand", () => {
	test("postmaster", () => {
		expect(parseRcptCommand("RCPT TO:<postmaster>")).toEqual({ path: { kind: "postmaster" }, params: [] });
	});

	test("postmaster in any case", () => {
		expect(parseRcptCommand("rcpt to:<PostMaster>")).toEqual({ path: { kind: "postmaster" }, params: [] });
	});

	test("postmaster at a domain is an ordinary mailbox", () => {
		expect(parseRcptCommand("RCPT TO:<postmaster@example.org>")).toEqual({
			path: {
				kind: "mailbox",
				mailbox: {
					local: { kind: "atom", value: "postmaster" },
					domain: { kind: "domain", value: "example.org" },
				},
			},
			params: [],
		});
	});

	test("duplicate keywords are kept in order", () => {
		expect(parseRcptCommand("RCPT TO:<a@example.org> NOTIFY=NEVER NOTIFY=SUCCESS")).toEqual({
			path: aAtExample,
			params: [
				{ name: "NOTIFY", value: "NEVER" },
				{ name: "NOTIFY", value: "SUCCESS" },
			],
		});
	});

	test("ORCPT value", () => {
		expect(parseRcptCommand("RCPT TO:<a@example.org> ORCPT=rfc822;original@example.com")).toMatchObject({
			params: [{ name: "ORCPT", value: "rfc822;original@example.com" }],
		});
	});

	test("bytes input", () => {
		expect(parseRcptCommand(Buffer.from("RCPT TO:<postmaster>"))).toEqual({
			path: { kind: "postmaster" },
			params: [],
		});
	});

	test.each([
		"RCPT TO:<>",
		"RCPT TO:<postmaster> ",
		"RCPT TO:<postmaster>x",
		"RCPT TO:<foo-.example.org>",
		"RCPT TO:<a@foo-.example.org>",
		"RCPT TO:<a@[somewhere]>",
		"MAIL FROM:<a@example.org>",
	])("rejects %j", (input) => {
		expect(parseRcptCommand(input)).toBe(false);
	});
});

describe("malformed input never throws", () => {
	test.each([
		"<",
		"MAIL FROM:",
		"MAIL FROM:<",
		'MAIL FROM:<"',
		'MAIL FROM:<"\\',
		"MAIL FROM:<a@[",
		"MAIL FROM:<a@[IPv6:",
		"MAIL FROM:<a@[IPv6:::",
		"RCPT TO:<@",
		"RCPT TO:<@a,",
		"ÿþ\u0000",
	])("%j", (input) => {
		expect(parseMailCommand(input)).toBe(false);
		expect(parseRcptCommand(input)).toBe(false);
	});
});

describe("parseEsmtpParams", () => {
	test("empty input is an empty list", () => {
		expect(parseEsmtpParams("")).toEqual([]);
	});

	test("keyword without value", () => {
		expect(parseEsmtpParams("SMTPUTF8")).toEqual([{ name: "SMTPUTF8", value: null }]);
	});

	test("tab separated", () => {
		expect(parseEsmtpParams("A=1\tB=2")).toEqual([
			{ name: "A", value: "1" },
			{ name: "B", value: "2" },
		]);
	});

	test("value may carry any printable byte except =", () => {
		expect(parseEsmtpParams("ENVID=<x@y>;[1]~")).toEqual([{ name: "ENVID", value: "<x@y>;[1]~" }]);
	});

	test.each(["SIZE=", " SIZE=1", "SIZE=1 ", "X-FOO=1", "=1", "A=1=2", "A=é"])("rejects %j", (input) => {
		expect(parseEsmtpParams(input)).toBe(false);
	});
});
