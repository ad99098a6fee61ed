// Byte classes used by the envelope grammar (RFC 5321 §4.1.2, RFC 5322 §3.2.3).
// All ranges are inclusive decimal byte values.

export function isDigit(c: number): boolean {
	return c >= 48 && c <= 57;
}

export function isAlpha(c: number): boolean {
	return (c >= 65 && c <= 90) || (c >= 97 && c <= 122);
}

export function isAlphanumeric(c: number): boolean {
	return isAlpha(c) || isDigit(c);
}

export function isHexDigit(c: number): boolean {
	return isDigit(c) || (c >= 65 && c <= 70) || (c >= 97 && c <= 102);
}

/** Letter, digit or hyphen. */
export function isLdh(c: number): boolean {
	return isAlphanumeric(c) || c === 45;
}

/** esmtp-value: 33–60, 62–126. Excludes "=", SP and controls. */
export function isEsmtpValueChar(c: number): boolean {
	return (c >= 33 && c <= 60) || (c >= 62 && c <= 126);
}

/** qtextSMTP: 32–33, 35–91, 93–126. Excludes DQUOTE and backslash. */
export function isQtext(c: number): boolean {
	return c === 32 || c === 33 || (c >= 35 && c <= 91) || (c >= 93 && c <= 126);
}

/** Second byte of a quoted-pair. */
export function isQuotedPairChar(c: number): boolean {
	return c >= 32 && c <= 126;
}

/** dcontent: 33–90, 94–126. Excludes "[", backslash and "]". */
export function isDcontent(c: number): boolean {
	return (c >= 33 && c <= 90) || (c >= 94 && c <= 126);
}

const ATEXT_SPECIALS = new Set(Array.from("!#$%&'*+-/=?^_`{|}~", (ch) => ch.charCodeAt(0)));

export function isAtext(c: number): boolean {
	return isAlphanumeric(c) || ATEXT_SPECIALS.has(c);
}

/** SP or HTAB. */
export function isWsp(c: number): boolean {
	return c === 32 || c === 9;
}

/** Bytes an IPv6 literal body may be made of. */
export function isIPv6Char(c: number): boolean {
	return isHexDigit(c) || c === 58 || c === 46;
}
