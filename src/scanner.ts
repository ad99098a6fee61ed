/**
 * Position-tracking rules over command text.
 *
 * A rule looks at `input` from `pos` and either returns the value it
 * recognised plus the position just past it, or `null` for no match.
 * Rules never mutate anything; alternation is backtracking by construction
 * because a failed branch simply leaves the caller's position untouched.
 *
 * Input is always a string holding one code unit per byte (see `toText`),
 * so every predicate below works on byte values 0–255.
 */

export interface Match<T> {
	value: T;
	end: number;
}

export type Rule<T> = (input: string, pos: number) => Match<T> | null;

export type Predicate = (code: number) => boolean;

/**
 * Bytes become code units 0–255 one-to-one, so a non-ASCII byte can never
 * masquerade as a printable ASCII character.
 */
export function toText(input: string | Uint8Array): string {
	if (typeof input === "string") return input;
	return Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString("latin1");
}

// ---- Terminals --------------------------------------------------------------

export function literal(text: string): Rule<string> {
	return (input, pos) =>
		input.startsWith(text, pos) ? { value: text, end: pos + text.length } : null;
}

// Only A-Z/a-z fold. String#toUpperCase would map e.g. U+017F to "S".
function foldAscii(code: number): number {
	return code >= 0x41 && code <= 0x5a ? code + 0x20 : code;
}

export function literalNoCase(text: string): Rule<string> {
	return (input, pos) => {
		if (pos + text.length > input.length) return null;
		for (let i = 0; i < text.length; i++) {
			if (foldAscii(input.charCodeAt(pos + i)) !== foldAscii(text.charCodeAt(i))) {
				return null;
			}
		}
		return { value: input.slice(pos, pos + text.length), end: pos + text.length };
	};
}

export function char(pred: Predicate): Rule<string> {
	return (input, pos) =>
		pos < input.length && pred(input.charCodeAt(pos))
			? { value: input[pos] ?? "", end: pos + 1 }
			: null;
}

/** Longest run of bytes satisfying `pred`, at least `min` and at most `max` long. */
export function takeWhile(pred: Predicate, min = 0, max = Infinity): Rule<string> {
	return (input, pos) => {
		let end = pos;
		while (end < input.length && end - pos < max && pred(input.charCodeAt(end))) {
			end++;
		}
		return end - pos >= min ? { value: input.slice(pos, end), end } : null;
	};
}

export function takeWhile1(pred: Predicate): Rule<string> {
	return takeWhile(pred, 1);
}

export const eof: Rule<null> = (input, pos) =>
	pos === input.length ? { value: null, end: pos } : null;

// ---- Combinators ------------------------------------------------------------

export function map<T, U>(rule: Rule<T>, fn: (value: T) => U): Rule<U> {
	return (input, pos) => {
		const m = rule(input, pos);
		return m ? { value: fn(m.value), end: m.end } : null;
	};
}

/** Runs `rule` but yields the exact text it consumed. */
export function recognize<T>(rule: Rule<T>): Rule<string> {
	return (input, pos) => {
		const m = rule(input, pos);
		return m ? { value: input.slice(pos, m.end), end: m.end } : null;
	};
}

export function pair<A, B>(first: Rule<A>, second: Rule<B>): Rule<[A, B]> {
	return (input, pos) => {
		const a = first(input, pos);
		if (!a) return null;
		const b = second(input, a.end);
		return b ? { value: [a.value, b.value], end: b.end } : null;
	};
}

export function preceded<A, B>(prefix: Rule<A>, rule: Rule<B>): Rule<B> {
	return map(pair(prefix, rule), ([, value]) => value);
}

export function terminated<A, B>(rule: Rule<A>, suffix: Rule<B>): Rule<A> {
	return map(pair(rule, suffix), ([value]) => value);
}

export function delimited<A, B, C>(open: Rule<A>, rule: Rule<B>, close: Rule<C>): Rule<B> {
	return preceded(open, terminated(rule, close));
}

/** Ordered choice: the first alternative that matches wins. */
export function alt<T>(...rules: Rule<T>[]): Rule<T> {
	return (input, pos) => {
		for (const rule of rules) {
			const m = rule(input, pos);
			if (m) return m;
		}
		return null;
	};
}

export function opt<T>(rule: Rule<T>): Rule<T | null> {
	return (input, pos) => rule(input, pos) ?? { value: null, end: pos };
}

export function many0<T>(rule: Rule<T>): Rule<T[]> {
	return (input, pos) => {
		const values: T[] = [];
		let end = pos;
		for (;;) {
			const m = rule(input, end);
			// a rule that matches without consuming would loop forever
			if (!m || m.end === end) break;
			values.push(m.value);
			end = m.end;
		}
		return { value: values, end };
	};
}

export function many1<T>(rule: Rule<T>): Rule<T[]> {
	const many = many0(rule);
	return (input, pos) => {
		const m = many(input, pos);
		return m && m.value.length > 0 ? m : null;
	};
}

/**
 * `item (sep item)*`. A separator that is not followed by an item is left
 * unconsumed for the caller.
 */
export function separated1<T, S>(item: Rule<T>, sep: Rule<S>): Rule<T[]> {
	return (input, pos) => {
		const first = item(input, pos);
		if (!first) return null;
		const rest = many0(preceded(sep, item))(input, first.end);
		const tail = rest ? rest.value : [];
		return { value: [first.value, ...tail], end: rest ? rest.end : first.end };
	};
}

/** Top-level entrypoint: a prefix match is not a match. */
export function exact<T>(rule: Rule<T>, text: string): T | false {
	const m = rule(text, 0);
	return m && m.end === text.length ? m.value : false;
}
