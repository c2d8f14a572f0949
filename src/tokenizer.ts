import { AtDialect, DEFAULT_DIALECT } from "./dialect.js";
import { AtParseError, AtParseErrorCode, AtResult } from "./errors.js";

export type AtTypeMarker = "=?" | "?" | "=" | "";

export type AtToken = {
	name: string;
	marker: AtTypeMarker;
	// Everything after the marker, up to the end of the sub-command
	tail: string;
	// Single-letter command from the V.250 basic syntax (E0, &F, S0=1, D...)
	basic: boolean;
	// Tail must be handed to the command as one token, without decoding
	verbatim: boolean;
	raw: string;
};

export type AtTokenResult = AtResult<{ token: AtToken }> & { raw: string };

export type AtTokenizedLine =
	| { kind: "EMPTY"; raw: string }
	| { kind: "REPEAT"; raw: string }
	| { kind: "UNSOLICITED"; raw: string }
	| { kind: "COMMANDS"; raw: string; commands: AtTokenResult[] };

type Scan = {
	result: AtTokenResult;
	next: number;
};

const NAME_CHAR = /^[A-Za-z0-9!%\-./:_]$/;

export function tokenize(line: string, dialect: AtDialect = DEFAULT_DIALECT): AtTokenizedLine {
	if (typeof line != "string")
		throw new TypeError(`AT line must be a string, got ${typeof line}`);

	const text = line.trim();
	if (text.length == 0)
		return { kind: "EMPTY", raw: line };
	if (/^a\/$/i.test(text))
		return { kind: "REPEAT", raw: line };
	if (!/^at/i.test(text))
		return { kind: "UNSOLICITED", raw: line };

	const body = text.substring(2);
	const commands: AtTokenResult[] = [];
	let cursor = 0;
	while (cursor < body.length) {
		const c = body[cursor];
		if (c == ";" || isSpace(c)) {
			cursor++;
			continue;
		}
		const { result, next } = scanCommand(body, cursor, dialect);
		commands.push(result);
		cursor = next;
	}

	return { kind: "COMMANDS", raw: line, commands };
}

/**
 * Tokenizes one sub-command given without the "AT" prefix, e.g. "+CSQ?" or "S0=1".
 */
export function tokenizeCommand(text: string, dialect: AtDialect = DEFAULT_DIALECT): AtTokenResult {
	const body = text.trim();
	if (body.length == 0)
		return failure("MalformedCommand", "Empty command", text);
	return scanCommand(body, 0, dialect).result;
}

function scanCommand(body: string, start: number, dialect: AtDialect): Scan {
	const c = body[start];
	if (dialect.extendedPrefixes.includes(c))
		return scanExtended(body, start, dialect);
	if (isLetter(c) || ((c == "&" || c == "\\") && isLetter(body.charAt(start + 1))))
		return scanBasic(body, start, dialect);

	const end = findCommandEnd(body, start);
	return {
		result: failure("MalformedCommand", `Missing command name before "${body.substring(start, end.index)}"`, body.substring(start, end.index)),
		next: end.ambiguous ? body.length : end.index + 1,
	};
}

function scanExtended(body: string, start: number, dialect: AtDialect): Scan {
	const end = findCommandEnd(body, start);
	const raw = body.substring(start, end.index);

	if (end.ambiguous) {
		return {
			result: failure("MalformedCommand", "Unterminated quote, can't find the end of the command", raw),
			next: body.length,
		};
	}

	const next = end.index + 1;
	let nameEnd = start + 1;
	while (nameEnd < end.index && isNameChar(body[nameEnd]))
		nameEnd++;

	if (nameEnd == start + 1)
		return { result: failure("MalformedCommand", `Missing command name after "${body[start]}"`, raw), next };

	const name = normalizeName(body.substring(start, nameEnd), dialect);
	const { marker, offset } = scanMarker(body, nameEnd, end.index);
	const tail = body.substring(offset, end.index);

	return {
		result: { success: true, raw, token: { name, marker, tail, basic: false, verbatim: false, raw } },
		next,
	};
}

function scanBasic(body: string, start: number, dialect: AtDialect): Scan {
	let cursor = start;
	let name: string;
	if (body[cursor] == "&" || body[cursor] == "\\") {
		name = body.substring(cursor, cursor + 2);
		cursor += 2;
	} else {
		name = body[cursor];
		cursor++;
	}

	const upperName = name.toUpperCase();
	if (dialect.verbatimCommands.some((v) => v.toUpperCase() == upperName)) {
		const raw = body.substring(start).trim();
		const tail = body.substring(cursor).trim();
		return {
			result: { success: true, raw, token: { name: normalizeName(name, dialect), marker: "", tail, basic: true, verbatim: true, raw } },
			next: body.length,
		};
	}

	// S-parameters carry their number in the name: S0, S12
	if (upperName == "S") {
		while (cursor < body.length && isDigit(body[cursor])) {
			name += body[cursor];
			cursor++;
		}
	}

	const { marker, offset } = scanMarker(body, cursor, body.length);
	cursor = offset;

	const tailStart = cursor;
	if (marker == "=" || marker == "") {
		while (cursor < body.length && isDigit(body[cursor]))
			cursor++;
	}

	const raw = body.substring(start, cursor).trimEnd();
	const token: AtToken = {
		name: normalizeName(name, dialect),
		marker,
		tail: body.substring(tailStart, cursor),
		basic: true,
		verbatim: false,
		raw,
	};
	return { result: { success: true, raw, token }, next: cursor };
}

function scanMarker(body: string, from: number, end: number): { marker: AtTypeMarker; offset: number } {
	const index = skipSpaces(body, from, end);
	if (body[index] == "=" && index < end) {
		const afterEq = skipSpaces(body, index + 1, end);
		if (body[afterEq] == "?" && afterEq < end)
			return { marker: "=?", offset: afterEq + 1 };
		return { marker: "=", offset: afterEq };
	}
	if (body[index] == "?" && index < end)
		return { marker: "?", offset: index + 1 };
	return { marker: "", offset: index };
}

/**
 * Position of the ";" closing the sub-command that starts at `from`, ignoring quoted regions.
 * An unterminated quote with a ";" after it makes the end ambiguous.
 */
function findCommandEnd(body: string, from: number): { index: number; ambiguous: boolean } {
	let i = from;
	while (i < body.length) {
		const c = body[i];
		if (c == '"') {
			const close = body.indexOf('"', i + 1);
			if (close < 0)
				return { index: body.length, ambiguous: body.indexOf(";", i + 1) >= 0 };
			i = close + 1;
			continue;
		}
		if (c == ";")
			return { index: i, ambiguous: false };
		i++;
	}
	return { index: body.length, ambiguous: false };
}

export function isNameChar(c: string): boolean {
	return NAME_CHAR.test(c);
}

function failure(code: AtParseErrorCode, message: string, raw: string): AtTokenResult {
	const error: AtParseError = { code, message };
	return { success: false, error, raw };
}

function normalizeName(name: string, dialect: AtDialect) {
	return dialect.caseInsensitive ? name.toUpperCase() : name;
}

function skipSpaces(body: string, from: number, end: number) {
	let i = from;
	while (i < end && isSpace(body[i]))
		i++;
	return i;
}

function isSpace(c: string) {
	return c == " " || c == "\t";
}

function isDigit(c: string) {
	return c >= "0" && c <= "9";
}

function isLetter(c: string) {
	return /^[A-Za-z]$/.test(c);
}
