import { addressLiteral } from "./address-literal.ts";
import { isQtext, isQuotedPairChar } from "./charsets.ts";
import {
	alt,
	char,
	delimited,
	exact,
	literal,
	many0,
	map,
	pair,
	preceded,
	recognize,
	type Rule,
	separated1,
	terminated,
	toText,
} from "./scanner.ts";
import { atom, label } from "./tokens.ts";
import type { DomainPart, LocalPart, Mailbox } from "./types.ts";

const dot = literal(".");

/** `sub-domain *("." sub-domain)` */
export const domain: Rule<string> = recognize(separated1(label, dot));

export const domainPart: Rule<DomainPart> = alt<DomainPart>(
	map(domain, (value): DomainPart => ({ kind: "domain", value })),
	map(addressLiteral, (lit): DomainPart => ({ kind: "literal", literal: lit })),
);

/** `Atom *("." Atom)` */
export const dotString: Rule<string> = recognize(separated1(atom, dot));

// quoted-pair yields the escaped byte itself
const quotedContent = alt(char(isQtext), preceded(literal("\\"), char(isQuotedPairChar)));

/** Quoted-string, returning the unescaped content. */
export const quotedString: Rule<string> = map(
	delimited(literal('"'), many0(quotedContent), literal('"')),
	(chars) => chars.join(""),
);

export const localPart: Rule<LocalPart> = alt<LocalPart>(
	map(dotString, (value): LocalPart => ({ kind: "atom", value })),
	map(quotedString, (value): LocalPart => ({ kind: "quoted", value })),
);

export const mailbox: Rule<Mailbox> = map(
	pair(terminated(localPart, literal("@")), domainPart),
	([local, host]): Mailbox => ({ local, domain: host }),
);

export function parseMailbox(input: string | Uint8Array): Mailbox | false {
	return exact(mailbox, toText(input));
}
