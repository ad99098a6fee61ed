import { isAlphanumeric, isEsmtpValueChar } from "./charsets.ts";
import {
	exact,
	literal,
	map,
	opt,
	pair,
	preceded,
	type Rule,
	separated1,
	takeWhile1,
	toText,
} from "./scanner.ts";
import { wsp } from "./tokens.ts";
import type { EsmtpParam } from "./types.ts";

export const esmtpKeyword: Rule<string> = takeWhile1(isAlphanumeric);

export const esmtpValue: Rule<string> = takeWhile1(isEsmtpValueChar);

/** `esmtp-keyword ["=" esmtp-value]`. Keywords keep the case they were sent in. */
export const esmtpParam: Rule<EsmtpParam> = map(
	pair(esmtpKeyword, opt(preceded(literal("="), esmtpValue))),
	([name, value]): EsmtpParam => ({ name, value }),
);

/** One or more parameters separated by runs of SP/HTAB. */
export const esmtpParams: Rule<EsmtpParam[]> = separated1(esmtpParam, wsp);

/**
 * Parses a whole parameter list such as `"SIZE=1000 BODY=8BITMIME"`.
 * Empty input yields an empty list.
 */
export function parseEsmtpParams(input: string | Uint8Array): EsmtpParam[] | false {
	return exact(
		map(opt(esmtpParams), (params) => params ?? []),
		toText(input),
	);
}
