/**
 * Address literals: `[192.0.2.1]`, `[IPv6:2001:db8::1]`, `[tag:content]`.
 *
 * The formal alternatives are tried in a fixed order (IPv4, IPv6, general)
 * and each one must reach the closing bracket on its own. Text that fits
 * none of them is only accepted by `parseAddressLiteral`, as a free-form
 * literal that can be upgraded later.
 */

import { isDcontent } from "./charsets.ts";
import { ipv4Address, ipv6Address } from "./ip.ts";
import {
	alt,
	delimited,
	eof,
	exact,
	literal,
	map,
	pair,
	type Rule,
	takeWhile,
	takeWhile1,
	terminated,
	toText,
} from "./scanner.ts";
import { label } from "./tokens.ts";
import type {
	AddressLiteral,
	FormalAddressLiteral,
	FreeFormLiteral,
	UpgradeResult,
} from "./types.ts";

const ipv4Literal: Rule<FormalAddressLiteral> = map(
	ipv4Address,
	(ip): FormalAddressLiteral => ({ kind: "ip", ip }),
);

const ipv6Literal: Rule<FormalAddressLiteral> = map(
	ipv6Address,
	(ip): FormalAddressLiteral => ({ kind: "ip", ip }),
);

// Tried after IPv6, so "IPv6:" with a body that is not an address lands here.
const generalLiteral: Rule<FormalAddressLiteral> = map(
	pair(terminated(label, literal(":")), takeWhile1(isDcontent)),
	([tag, value]): FormalAddressLiteral => ({ kind: "tagged", tag, value }),
);

const FORMAL = [ipv4Literal, ipv6Literal, generalLiteral];

/** `"[" (IPv4 / IPv6 / general) "]"` as it appears in a mailbox domain. */
export const addressLiteral: Rule<FormalAddressLiteral> = alt(
	...FORMAL.map((rule) => delimited(literal("["), rule, literal("]"))),
);

/** Formal literal body without brackets, consumed to the end of input. */
const literalContent: Rule<FormalAddressLiteral> = alt(
	...FORMAL.map((rule) => terminated(rule, eof)),
);

const freeFormLiteral: Rule<FreeFormLiteral> = map(
	delimited(literal("["), takeWhile((c) => c !== 0x5b && c !== 0x5d), literal("]")),
	(value): FreeFormLiteral => ({ kind: "freeform", value }),
);

/**
 * Parses a complete bracketed literal such as `"[192.0.2.1]"`.
 * Returns `false` unless the whole text is one literal.
 */
export function parseAddressLiteral(text: string | Uint8Array): AddressLiteral | false {
	return exact(alt<AddressLiteral>(addressLiteral, freeFormLiteral), toText(text));
}

/**
 * Parses the inside of a literal, e.g. `"IPv6:2001:db8::1"`.
 */
export function parseAddressLiteralContent(
	text: string | Uint8Array,
): FormalAddressLiteral | false {
	return exact(literalContent, toText(text));
}

/**
 * Re-reads a free-form literal as one of the formal forms. The argument is
 * left as it is; on failure the caller keeps using it.
 */
export function upgradeAddressLiteral(freeForm: FreeFormLiteral): UpgradeResult {
	const upgraded = parseAddressLiteralContent(freeForm.value);
	return upgraded ? { upgraded: true, literal: upgraded } : { upgraded: false };
}
