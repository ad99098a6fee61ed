import { isAlphanumeric, isAtext, isLdh, isWsp } from "./charsets.ts";
import { type Rule, takeWhile1 } from "./scanner.ts";

/** One or more atext bytes. */
export const atom: Rule<string> = takeWhile1(isAtext);

/** One or more SP/HTAB bytes. */
export const wsp: Rule<string> = takeWhile1(isWsp);

/**
 * sub-domain / standardized-tag: `Let-dig [Ldh-str]`, never ending in "-".
 *
 * The run is scanned greedily. Whatever follows a label in this grammar is
 * never a letter, digit or hyphen, so a run ending in "-" cannot be rescued
 * by stopping earlier.
 */
export const label: Rule<string> = (input, pos) => {
	if (pos >= input.length || !isAlphanumeric(input.charCodeAt(pos))) return null;
	let end = pos + 1;
	while (end < input.length && isLdh(input.charCodeAt(end))) end++;
	if (input.charCodeAt(end - 1) === 45) return null;
	return { value: input.slice(pos, end), end };
};
