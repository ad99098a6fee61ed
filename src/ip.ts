/**
 * IP address pieces of the address-literal grammar.
 *
 * IPv4 octets are matched by the grammar itself (1–3 digits, 0–255, leading
 * zeros tolerated). IPv6 bodies are collected by byte class and then handed
 * to node:net for validation; the accepted text is re-rendered in RFC 5952
 * form so equal addresses compare equal.
 */

import { isIPv6 } from "node:net";
import { isDigit, isIPv6Char } from "./charsets.ts";
import {
	literal,
	literalNoCase,
	map,
	pair,
	preceded,
	type Rule,
	takeWhile,
	takeWhile1,
} from "./scanner.ts";
import type { IPv4Address, IPv6Address } from "./types.ts";

const octet: Rule<number> = (input, pos) => {
	const m = takeWhile(isDigit, 1, 3)(input, pos);
	if (!m) return null;
	const n = Number.parseInt(m.value, 10);
	return n <= 255 ? { value: n, end: m.end } : null;
};

const dotOctet = preceded(literal("."), octet);

export const ipv4Address: Rule<IPv4Address> = map(
	pair(pair(octet, dotOctet), pair(dotOctet, dotOctet)),
	([[a, b], [c, d]]): IPv4Address => ({ family: 4, address: `${a}.${b}.${c}.${d}` }),
);

const ipv6Body = preceded(literalNoCase("IPv6:"), takeWhile1(isIPv6Char));

export const ipv6Address: Rule<IPv6Address> = (input, pos) => {
	const m = ipv6Body(input, pos);
	if (!m || !isIPv6(m.value)) return null;
	return { value: { family: 6, address: formatIPv6(m.value) }, end: m.end };
};

// ---- RFC 5952 rendering -----------------------------------------------------

function parseGroups(part: string): number[] {
	if (part === "") return [];
	const groups: number[] = [];
	for (const piece of part.split(":")) {
		if (piece.includes(".")) {
			const [a = 0, b = 0, c = 0, d = 0] = piece.split(".").map((o) => Number.parseInt(o, 10));
			groups.push((a << 8) | b, (c << 8) | d);
		} else {
			groups.push(Number.parseInt(piece, 16));
		}
	}
	return groups;
}

/** Expands a textual IPv6 address (already validated) to eight 16-bit groups. */
export function expandIPv6(text: string): number[] {
	const gap = text.indexOf("::");
	if (gap === -1) return parseGroups(text);
	const head = parseGroups(text.slice(0, gap));
	const tail = parseGroups(text.slice(gap + 2));
	const zeros = new Array<number>(8 - head.length - tail.length).fill(0);
	return [...head, ...zeros, ...tail];
}

/**
 * Lower-case hex, no leading zeros, the longest run (first on a tie) of two
 * or more zero groups collapsed to "::". IPv4-mapped addresses keep their
 * dotted tail.
 */
export function formatIPv6(text: string): string {
	const groups = expandIPv6(text);

	if (groups.slice(0, 5).every((g) => g === 0) && groups[5] === 0xffff) {
		const hi = groups[6] ?? 0;
		const lo = groups[7] ?? 0;
		return `::ffff:${hi >> 8}.${hi & 0xff}.${lo >> 8}.${lo & 0xff}`;
	}

	let bestStart = -1;
	let bestLen = 0;
	for (let i = 0; i < groups.length; ) {
		if (groups[i] !== 0) {
			i++;
			continue;
		}
		let j = i;
		while (j < groups.length && groups[j] === 0) j++;
		if (j - i > bestLen) {
			bestStart = i;
			bestLen = j - i;
		}
		i = j;
	}

	const hex = groups.map((g) => g.toString(16));
	if (bestLen < 2) return hex.join(":");
	const head = hex.slice(0, bestStart).join(":");
	const tail = hex.slice(bestStart + bestLen).join(":");
	return `${head}::${tail}`;
}
