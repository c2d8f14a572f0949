import { AtParameter } from "./AtCommand.js";
import { AtResult, parseError } from "./errors.js";

export type AtParametersResult = AtResult<{ parameters: AtParameter[] }>;

const INTEGER_RE = /^([+-]?)([0-9]+)$/;
const QUOTED_RE = /^"((?:[^"]|"")*)"$/;

/**
 * Splits a parameter tail on commas outside of quoted regions and decodes every segment.
 * Empty segments keep their position as OMITTED.
 */
export function decodeParameters(tail: string): AtParametersResult {
	const segments = splitParameters(tail);
	if (!segments)
		return parseError("UnterminatedQuote", `Unterminated quoted string in "${tail}"`);
	return { success: true, parameters: segments.map(decodeParameter) };
}

export function splitParameters(tail: string): string[] | undefined {
	const segments: string[] = [];
	let quoted = false;
	let start = 0;
	for (let i = 0; i < tail.length; i++) {
		const c = tail[i];
		if (c == '"') {
			quoted = !quoted;
		} else if (c == "," && !quoted) {
			segments.push(tail.substring(start, i));
			start = i + 1;
		}
	}
	if (quoted)
		return undefined;
	segments.push(tail.substring(start));
	return segments;
}

export function decodeParameter(segment: string): AtParameter {
	const text = segment.trim();
	if (text.length == 0)
		return { type: "OMITTED" };

	const integer = text.match(INTEGER_RE);
	if (integer) {
		const [, sign, digits] = integer;
		const value = Number(sign + digits);
		if (Number.isSafeInteger(value)) {
			// -0 and 0 are the same parameter
			const normalized = value == 0 ? 0 : value;
			const canonical = String(Math.abs(normalized));
			return digits.length > canonical.length ?
				{ type: "INTEGER", value: normalized, width: digits.length } :
				{ type: "INTEGER", value: normalized };
		}
	}

	const quoted = text.match(QUOTED_RE);
	if (quoted)
		return { type: "STRING", value: quoted[1].replace(/""/g, '"') };

	return { type: "TOKEN", value: text };
}

export function encodeParameters(params: readonly AtParameter[]): string {
	return params.map((param, index) => encodeParameter(param, index == 0)).join(",");
}

/**
 * `leading` marks the first parameter of a tail, which must not start with "?".
 */
export function encodeParameter(param: AtParameter, leading = false): string {
	switch (param.type) {
		case "OMITTED":
			return "";
		case "INTEGER":
			return encodeInteger(param.value, param.width);
		case "STRING":
			return quoteString(param.value);
		case "TOKEN":
			return isVerbatimToken(param.value, leading) ? param.value : quoteString(param.value);
	}
}

export function quoteString(value: string): string {
	return `"${value.replace(/"/g, '""')}"`;
}

function encodeInteger(value: number, width?: number): string {
	if (!Number.isSafeInteger(value))
		throw new RangeError(`Integer parameter out of range: ${value}`);
	const digits = String(Math.abs(value));
	const sign = value < 0 ? "-" : "";
	return width ? sign + digits.padStart(width, "0") : sign + digits;
}

// A token is written as-is only when it would be read back as the same token,
// ";" ends the command and a leading "?" turns "=" into a TEST marker
function isVerbatimToken(value: string, leading: boolean): boolean {
	if (value.includes(";") || (leading && value.startsWith("?")))
		return false;
	const segments = splitParameters(value);
	if (!segments || segments.length != 1)
		return false;
	const decoded = decodeParameter(value);
	return decoded.type == "TOKEN" && decoded.value == value;
}
