/**
 * Meaning of the well-known MAIL FROM / RCPT TO parameters.
 *
 * The grammar hands over parameters exactly as sent. This module is where
 * keywords are compared case-insensitively and where values are checked
 * against the extensions that define them: SIZE (RFC 1870), BODY (RFC 6152),
 * SMTPUTF8 (RFC 6531), REQUIRETLS (RFC 8689) and the DSN parameters
 * RET / ENVID / NOTIFY / ORCPT (RFC 3461).
 *
 * Refusals come back as SMTPError values carrying the reply code a session
 * should send; nothing here throws.
 */

import { isUtf8 } from "node:buffer";
import { isDigit } from "./charsets.ts";
import { createSMTPError } from "./errors.ts";
import {
	alt,
	char,
	exact,
	literal,
	many1,
	map,
	pair,
	recognize,
	type Rule,
	takeWhile,
	terminated,
} from "./scanner.ts";
import { atom } from "./tokens.ts";
import type {
	EnvelopeOptions,
	EsmtpParam,
	MailParameters,
	NotifyValue,
	OriginalRecipient,
	RcptParameters,
	SMTPError,
} from "./types.ts";

const DEFAULT_ENVELOPE_OPTIONS: Readonly<Required<EnvelopeOptions>> = Object.freeze({
	size: 0,
	hideSize: false,
	hideDSN: false,
	hideSMTPUTF8: false,
});

// ---- xtext ------------------------------------------------------------------

/**
 * Decodes `+HH` escapes. A run of escapes that forms valid UTF-8 is read as
 * UTF-8; any other run maps each byte to the character with that code.
 */
export function decodeXtext(value: string): string {
	return value.replace(/(?:\+[0-9A-F]{2})+/gi, (run) => {
		const bytes = Buffer.from(run.replace(/\+/g, ""), "hex");
		return bytes.toString(isUtf8(bytes) ? "utf8" : "latin1");
	});
}

/** Escapes "+", "=" and every byte outside 33–126 of the UTF-8 form. */
export function encodeXtext(value: string): string {
	let out = "";
	for (const byte of Buffer.from(value, "utf8")) {
		if (byte >= 33 && byte <= 126 && byte !== 0x2b && byte !== 0x3d) {
			out += String.fromCharCode(byte);
		} else {
			out += `+${byte.toString(16).toUpperCase().padStart(2, "0")}`;
		}
	}
	return out;
}

const isXchar = (c: number): boolean => c >= 33 && c <= 126 && c !== 0x2b && c !== 0x3d;
const isUpperHex = (c: number): boolean => isDigit(c) || (c >= 65 && c <= 70);

const xtext: Rule<string> = recognize(
	many1(alt(char(isXchar), recognize(pair(literal("+"), takeWhile(isUpperHex, 2, 2))))),
);

const orcpt: Rule<OriginalRecipient> = map(
	pair(terminated(atom, literal(";")), xtext),
	([addrType, address]): OriginalRecipient => ({ addrType, address: decodeXtext(address) }),
);

/** `addr-type ";" xtext`, e.g. `rfc822;user+40example.com`. */
export function parseOrcpt(value: string): OriginalRecipient | false {
	return exact(orcpt, value);
}

// ---- NOTIFY -----------------------------------------------------------------

const NOTIFY_VALUES: readonly NotifyValue[] = ["NEVER", "SUCCESS", "FAILURE", "DELAY"];

function isNotifyValue(value: string): value is NotifyValue {
	return NOTIFY_VALUES.some((v) => v === value);
}

export function parseNotify(value: string): NotifyValue[] | SMTPError {
	const values: NotifyValue[] = [];
	for (const v of value.toUpperCase().split(",")) {
		if (!isNotifyValue(v)) {
			return createSMTPError(501, "Error: NOTIFY parameter must be NEVER, SUCCESS, FAILURE, or DELAY");
		}
		values.push(v);
	}
	if (values.includes("NEVER") && values.length > 1) {
		return createSMTPError(501, "Error: NOTIFY=NEVER cannot be combined with other values");
	}
	return values;
}

// ---- MAIL FROM --------------------------------------------------------------

export function interpretMailParams(
	params: readonly EsmtpParam[],
	options: EnvelopeOptions = {},
): MailParameters | SMTPError {
	const opts = { ...DEFAULT_ENVELOPE_OPTIONS, ...options };
	const result: MailParameters = {
		size: null,
		bodyType: "7bit",
		smtpUtf8: false,
		requireTLS: false,
		dsn: { ret: null, envid: null },
		extra: [],
	};

	for (const param of params) {
		const value = param.value;
		switch (param.name.toUpperCase()) {
			case "SIZE": {
				if (value === null || !/^\d+$/.test(value)) {
					return createSMTPError(501, "Error: Invalid SIZE parameter value");
				}
				const size = Number(value);
				if (!Number.isSafeInteger(size)) {
					return createSMTPError(501, "Error: Invalid SIZE parameter value");
				}
				if (!opts.hideSize && opts.size && size > opts.size) {
					return createSMTPError(
						552,
						`Error: message exceeds fixed maximum message size ${opts.size}`,
						"SYSTEM_FULL",
					);
				}
				result.size = size;
				break;
			}

			case "BODY": {
				const body = value?.toUpperCase();
				if (body === "7BIT") result.bodyType = "7bit";
				else if (body === "8BITMIME") result.bodyType = "8bitmime";
				else return createSMTPError(501, "Error: Unknown BODY parameter value");
				break;
			}

			case "SMTPUTF8":
				if (opts.hideSMTPUTF8) {
					return createSMTPError(555, "Error: SMTPUTF8 is not supported");
				}
				if (value !== null) {
					return createSMTPError(501, "Invalid SMTPUTF8 parameter. This flag does not accept a value");
				}
				result.smtpUtf8 = true;
				break;

			case "REQUIRETLS":
				if (value !== null) {
					return createSMTPError(501, "Invalid REQUIRETLS parameter. This flag does not accept a value");
				}
				result.requireTLS = true;
				break;

			case "RET": {
				if (opts.hideDSN) {
					result.extra.push(param);
					break;
				}
				const ret = value?.toUpperCase();
				if (ret !== "FULL" && ret !== "HDRS") {
					return createSMTPError(501, "Invalid RET parameter value. Must be FULL or HDRS");
				}
				result.dsn.ret = ret;
				break;
			}

			case "ENVID":
				if (opts.hideDSN) {
					result.extra.push(param);
					break;
				}
				if (value === null) {
					return createSMTPError(501, "Error: ENVID requires a value");
				}
				if (exact(xtext, value) === false) {
					return createSMTPError(501, "Error: Invalid ENVID parameter value");
				}
				result.dsn.envid = decodeXtext(value);
				break;

			default:
				result.extra.push(param);
		}
	}

	return result;
}

// ---- RCPT TO ----------------------------------------------------------------

export function interpretRcptParams(
	params: readonly EsmtpParam[],
	options: EnvelopeOptions = {},
): RcptParameters | SMTPError {
	const opts = { ...DEFAULT_ENVELOPE_OPTIONS, ...options };
	const result: RcptParameters = { dsn: {}, extra: [] };

	for (const param of params) {
		const name = param.name.toUpperCase();
		if (opts.hideDSN || (name !== "NOTIFY" && name !== "ORCPT")) {
			result.extra.push(param);
			continue;
		}

		if (name === "NOTIFY") {
			const notify = parseNotify(param.value ?? "");
			if (notify instanceof Error) return notify;
			result.dsn.notify = notify;
		} else {
			const original = param.value === null ? false : parseOrcpt(param.value);
			if (!original) {
				return createSMTPError(501, "Error: Invalid ORCPT parameter value");
			}
			result.dsn.orcpt = original;
		}
	}

	return result;
}
