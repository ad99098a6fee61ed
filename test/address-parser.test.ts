import { describe, expect, test } from "vitest";
import { parseAddressCommand } from "../src/address-parser.ts";

describe("parseAddressCommand – MAIL FROM", () => {
	test("basic address", () => {
		const r = parseAddressCommand("MAIL FROM", "MAIL FROM:<user@example.com>");
		expect(r).toEqual({ address: "user@example.com", args: false });
	});

	test("case-insensitive prefix", () => {
		const r = parseAddressCommand("mail from", "mail from:<user@example.com>");
		expect(r).toMatchObject({ address: "user@example.com" });
	});

	test("with SIZE parameter", () => {
		const r = parseAddressCommand("MAIL FROM", "MAIL FROM:<a@b.com> SIZE=12345");
		expect(r).not.toBe(false);
		if (r && r.args) expect(r.args.SIZE).toBe("12345");
	});

	test("with SMTPUTF8 flag (no value)", () => {
		const r = parseAddressCommand("MAIL FROM", "MAIL FROM:<a@b.com> SMTPUTF8");
		expect(r).toEqual({ address: "a@b.com", args: { SMTPUTF8: true } });
	});

	test("empty bounce address <>", () => {
		const r = parseAddressCommand("MAIL FROM", "MAIL FROM:<>");
		expect(r).toEqual({ address: "", args: false });
	});

	test("multiple parameters", () => {
		const r = parseAddressCommand("MAIL FROM", "MAIL FROM:<a@b.com> SIZE=100 BODY=7BIT");
		expect(r).toEqual({ address: "a@b.com", args: { SIZE: "100", BODY: "7BIT" } });
	});

	test("keywords are upper-cased, a later duplicate wins", () => {
		const r = parseAddressCommand("MAIL FROM", "MAIL FROM:<a@b.com> size=1 SIZE=2");
		expect(r).toEqual({ address: "a@b.com", args: { SIZE: "2" } });
	});

	test("xtext-encoded parameter value", () => {
		// +2B is '+' in xtext
		const r = parseAddressCommand("MAIL FROM", "MAIL FROM:<a@b.com> ENVID=foo+2Bbar");
		expect(r).toEqual({ address: "a@b.com", args: { ENVID: "foo+bar" } });
	});

	test("xtext decoding can be turned off", () => {
		const r = parseAddressCommand("MAIL FROM", "MAIL FROM:<a@b.com> ENVID=foo+2Bbar", {
			decodeXtext: false,
		});
		expect(r).toEqual({ address: "a@b.com", args: { ENVID: "foo+2Bbar" } });
	});

	test("surrounding whitespace is trimmed", () => {
		const r = parseAddressCommand("MAIL FROM", "  MAIL FROM:<a@b.com>\r\n");
		expect(r).toEqual({ address: "a@b.com", args: false });
	});

	test("quoted local part is rendered with its quotes", () => {
		const r = parseAddressCommand("MAIL FROM", 'MAIL FROM:<"john doe"@b.com>');
		expect(r).toEqual({ address: '"john doe"@b.com', args: false });
	});

	test("source route is dropped", () => {
		const r = parseAddressCommand("MAIL FROM", "MAIL FROM:<@relay.b.com:a@b.com>");
		expect(r).toEqual({ address: "a@b.com", args: false });
	});
});

describe("parseAddressCommand – RCPT TO", () => {
	test("basic address", () => {
		const r = parseAddressCommand("RCPT TO", "RCPT TO:<recipient@example.com>");
		expect(r).toMatchObject({ address: "recipient@example.com" });
	});

	test("postmaster", () => {
		const r = parseAddressCommand("RCPT TO", "RCPT TO:<Postmaster>");
		expect(r).toEqual({ address: "postmaster", args: false });
	});

	test("with NOTIFY parameter", () => {
		const r = parseAddressCommand("RCPT TO", "RCPT TO:<a@b.com> NOTIFY=SUCCESS,FAILURE");
		expect(r).toEqual({ address: "a@b.com", args: { NOTIFY: "SUCCESS,FAILURE" } });
	});

	test("with ORCPT parameter", () => {
		const r = parseAddressCommand("RCPT TO", "RCPT TO:<a@b.com> ORCPT=rfc822;original@example.com");
		expect(r).toEqual({ address: "a@b.com", args: { ORCPT: "rfc822;original@example.com" } });
	});
});

describe("parseAddressCommand – limits", () => {
	test("64-octet local part is accepted", () => {
		const local = "a".repeat(64);
		expect(parseAddressCommand("MAIL FROM", `MAIL FROM:<${local}@b.com>`)).toMatchObject({
			address: `${local}@b.com`,
		});
	});

	test("65-octet local part is rejected", () => {
		const local = "a".repeat(65);
		expect(parseAddressCommand("MAIL FROM", `MAIL FROM:<${local}@b.com>`)).toBe(false);
	});

	test("address exceeding 254 octets is rejected", () => {
		const local = "a".repeat(60);
		const ok = `${"b".repeat(189)}.com`;
		const tooLong = `${"b".repeat(190)}.com`;
		expect(parseAddressCommand("RCPT TO", `RCPT TO:<${local}@${ok}>`)).not.toBe(false);
		expect(parseAddressCommand("RCPT TO", `RCPT TO:<${local}@${tooLong}>`)).toBe(false);
	});

	test("limits are configurable", () => {
		expect(
			parseAddressCommand("MAIL FROM", "MAIL FROM:<abcd@b.com>", { maxLocalPartLength: 3 }),
		).toBe(false);
		expect(parseAddressCommand("MAIL FROM", "MAIL FROM:<abc@b.com>", { maxPathLength: 6 })).toBe(
			false,
		);
		expect(parseAddressCommand("MAIL FROM", "MAIL FROM:<abc@b.com>", { maxPathLength: 9 })).toEqual({
			address: "abc@b.com",
			args: false,
		});
	});
});

describe("parseAddressCommand – invalid inputs", () => {
	test("wrong prefix returns false", () => {
		expect(parseAddressCommand("MAIL FROM", "RCPT TO:<a@b.com>")).toBe(false);
	});

	test("unknown command name returns false", () => {
		expect(parseAddressCommand("VRFY", "MAIL FROM:<a@b.com>")).toBe(false);
	});

	test("missing colon returns false", () => {
		expect(parseAddressCommand("MAIL FROM", "MAIL FROM <a@b.com>")).toBe(false);
	});

	test("missing angle brackets returns false", () => {
		expect(parseAddressCommand("MAIL FROM", "MAIL FROM:user@example.com")).toBe(false);
	});

	test("address without @ returns false", () => {
		expect(parseAddressCommand("MAIL FROM", "MAIL FROM:<nodomain>")).toBe(false);
	});

	test("address with leading dot in local part returns false", () => {
		expect(parseAddressCommand("MAIL FROM", "MAIL FROM:<.user@example.com>")).toBe(false);
	});

	test("address with trailing dot in local part returns false", () => {
		expect(parseAddressCommand("MAIL FROM", "MAIL FROM:<user.@example.com>")).toBe(false);
	});

	test("address with consecutive dots returns false", () => {
		expect(parseAddressCommand("MAIL FROM", "MAIL FROM:<u..r@example.com>")).toBe(false);
	});

	test("null forward-path returns false", () => {
		expect(parseAddressCommand("RCPT TO", "RCPT TO:<>")).toBe(false);
	});

	test("empty input returns false", () => {
		expect(parseAddressCommand("MAIL FROM", "")).toBe(false);
	});
});
