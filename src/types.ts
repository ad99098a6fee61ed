// ---- Address literals -------------------------------------------------------

export interface IPv4Address {
	readonly family: 4;
	/** Dotted-quad, octets without leading zeros. */
	readonly address: string;
}

export interface IPv6Address {
	readonly family: 6;
	/** RFC 5952 text form. */
	readonly address: string;
}

export type IpAddress = IPv4Address | IPv6Address;

export interface IpLiteral {
	readonly kind: "ip";
	readonly ip: IpAddress;
}

/** General-address-literal, e.g. `[x400:cn=bob]`. */
export interface TaggedLiteral {
	readonly kind: "tagged";
	readonly tag: string;
	readonly value: string;
}

/**
 * Bracketed text that matched none of the formal forms. Only produced by
 * `parseAddressLiteral`; see `upgradeAddressLiteral`.
 */
export interface FreeFormLiteral {
	readonly kind: "freeform";
	readonly value: string;
}

export type FormalAddressLiteral = IpLiteral | TaggedLiteral;

export type AddressLiteral = FormalAddressLiteral | FreeFormLiteral;

export type UpgradeResult =
	| { readonly upgraded: true; readonly literal: FormalAddressLiteral }
	| { readonly upgraded: false };

// ---- Mailbox ----------------------------------------------------------------

export type LocalPart =
	| { readonly kind: "atom"; readonly value: string }
	/** `value` is unescaped; quoting is reapplied when formatting. */
	| { readonly kind: "quoted"; readonly value: string };

export type DomainPart =
	| { readonly kind: "domain"; readonly value: string }
	| { readonly kind: "literal"; readonly literal: AddressLiteral };

export interface Mailbox {
	readonly local: LocalPart;
	readonly domain: DomainPart;
}

/** RCPT TO argument. */
export type Path =
	| { readonly kind: "mailbox"; readonly mailbox: Mailbox }
	| { readonly kind: "postmaster" };

/** MAIL FROM argument. */
export type ReversePath =
	| { readonly kind: "mailbox"; readonly mailbox: Mailbox }
	| { readonly kind: "null" };

// ---- Commands ---------------------------------------------------------------

export interface EsmtpParam {
	readonly name: string;
	readonly value: string | null;
}

export interface MailCommand {
	readonly reversePath: ReversePath;
	/** Source order, duplicates kept. Empty when no parameters were sent. */
	readonly params: readonly EsmtpParam[];
}

export interface RcptCommand {
	readonly path: Path;
	readonly params: readonly EsmtpParam[];
}

// ---- Session-facing shapes --------------------------------------------------

export interface DSNEnvelope {
	ret: "FULL" | "HDRS" | null;
	envid: string | null;
}

export type NotifyValue = "NEVER" | "SUCCESS" | "FAILURE" | "DELAY";

export interface OriginalRecipient {
	addrType: string;
	address: string;
}

export interface DSNRcpt {
	notify?: NotifyValue[];
	orcpt?: OriginalRecipient;
}

export interface SMTPAddressArgs {
	SIZE?: string;
	BODY?: string;
	SMTPUTF8?: true;
	REQUIRETLS?: true;
	RET?: string;
	ENVID?: string;
	NOTIFY?: string;
	ORCPT?: string;
	[key: string]: string | true | undefined;
}

export interface SMTPAddress {
	/** Rendered mailbox; `""` for `<>`, `"postmaster"` for `<postmaster>`. */
	address: string;
	args: SMTPAddressArgs | false;
}

export interface MailParameters {
	size: number | null;
	bodyType: "7bit" | "8bitmime";
	smtpUtf8: boolean;
	requireTLS: boolean;
	dsn: DSNEnvelope;
	/** Parameters this library does not interpret, in source order. */
	extra: EsmtpParam[];
}

export interface RcptParameters {
	dsn: DSNRcpt;
	extra: EsmtpParam[];
}

export interface SMTPError extends Error {
	responseCode?: number;
	code?: string;
}

// ---- Options ----------------------------------------------------------------

export interface AddressCommandOptions {
	/** RFC 5321 §4.5.3.1.1. Default 64. */
	maxLocalPartLength?: number;
	/** RFC 5321 §4.5.3.1.3, counted as `local@domain`. Default 254. */
	maxPathLength?: number;
	/** Decode `+HH` sequences in parameter values. Default true. */
	decodeXtext?: boolean;
}

export interface EnvelopeOptions {
	/** Maximum message size announced via SIZE; 0 disables the check. */
	size?: number;
	hideSize?: boolean;
	hideDSN?: boolean;
	hideSMTPUTF8?: boolean;
}
