// Text forms of the envelope values, the inverse of the grammar.

import type {
	AddressLiteral,
	DomainPart,
	EsmtpParam,
	LocalPart,
	Mailbox,
	Path,
	ReversePath,
} from "./types.ts";

export function formatLocalPart(local: LocalPart): string {
	switch (local.kind) {
		case "atom":
			return local.value;
		case "quoted":
			// only DQUOTE and backslash need a quoted-pair
			return `"${local.value.replace(/["\\]/g, "\\$&")}"`;
	}
}

export function formatAddressLiteral(literal: AddressLiteral): string {
	switch (literal.kind) {
		case "ip":
			return literal.ip.family === 4 ? `[${literal.ip.address}]` : `[IPv6:${literal.ip.address}]`;
		case "tagged":
			return `[${literal.tag}:${literal.value}]`;
		case "freeform":
			return `[${literal.value}]`;
	}
}

export function formatDomainPart(domain: DomainPart): string {
	switch (domain.kind) {
		case "domain":
			return domain.value;
		case "literal":
			return formatAddressLiteral(domain.literal);
	}
}

export function formatMailbox(mailbox: Mailbox): string {
	return `${formatLocalPart(mailbox.local)}@${formatDomainPart(mailbox.domain)}`;
}

export function formatPath(path: Path): string {
	return path.kind === "postmaster" ? "<postmaster>" : `<${formatMailbox(path.mailbox)}>`;
}

export function formatReversePath(path: ReversePath): string {
	return path.kind === "null" ? "<>" : `<${formatMailbox(path.mailbox)}>`;
}

/** `"SIZE=1000 SMTPUTF8"`; empty string for no parameters. */
export function formatEsmtpParams(params: readonly EsmtpParam[]): string {
	return params.map((p) => (p.value === null ? p.name : `${p.name}=${p.value}`)).join(" ");
}
