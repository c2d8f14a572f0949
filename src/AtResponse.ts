import { sprintf } from "sprintf-js";
import { AtDispatchError } from "./errors.js";

/**
 * Informational lines followed by exactly one final result (status) line.
 */
export type AtResponse = {
	readonly lines: readonly string[];
	readonly status: string;
	readonly error?: AtDispatchError;
};

export type AtResponseFormat = {
	// V1: "\r\nOK\r\n", V0: numeric result codes "0\r"
	verbose: boolean;
	// Q1: final result codes are not transmitted
	quiet: boolean;
};

export const DEFAULT_RESPONSE_FORMAT: Readonly<AtResponseFormat> = Object.freeze({
	verbose: true,
	quiet: false,
});

// ITU-T V.250 numeric result codes
export const FINAL_RESULT_CODES: Readonly<Record<string, number>> = Object.freeze({
	"OK":			0,
	"CONNECT":		1,
	"RING":			2,
	"NO CARRIER":	3,
	"ERROR":		4,
	"NO DIALTONE":	6,
	"BUSY":			7,
	"NO ANSWER":	8,
});

export function createResponse(lines: readonly string[], status: string, error?: AtDispatchError): AtResponse {
	if (!isValidLine(status) || status.length == 0)
		throw new TypeError(`Invalid final result: ${JSON.stringify(status)}`);
	for (const line of lines) {
		if (!isValidLine(line))
			throw new TypeError(`Invalid response line: ${JSON.stringify(line)}`);
	}
	const response = error ?
		{ lines: Object.freeze([...lines]), status, error: Object.freeze({ ...error }) } :
		{ lines: Object.freeze([...lines]), status };
	return Object.freeze(response);
}

export function okResponse(lines: readonly string[] = []): AtResponse {
	return createResponse(lines, "OK");
}

export function errorResponse(error: AtDispatchError, status = "ERROR", lines: readonly string[] = []): AtResponse {
	return createResponse(lines, status, error);
}

export function isResponse(value: unknown): value is AtResponse {
	return typeof value == "object" && value != null && "status" in value && "lines" in value;
}

export function isSuccessResponse(response: AtResponse): boolean {
	return response.error == null && !isErrorResult(response.status);
}

export function isErrorResult(status: string): boolean {
	return status == "ERROR" || /^\+(CME|CMS) ERROR:/.test(status);
}

export function isFinalResult(line: string): boolean {
	return Object.hasOwn(FINAL_RESULT_CODES, line) || /^\+(CME|CMS) ERROR:/.test(line);
}

export function encodeResponse(response: AtResponse, format: AtResponseFormat = DEFAULT_RESPONSE_FORMAT): string {
	let output = "";
	for (const line of response.lines)
		output += encodeLine(line, format);
	if (!format.quiet)
		output += encodeStatus(response.status, format);
	return output;
}

export function encodeResponses(responses: readonly AtResponse[], format: AtResponseFormat = DEFAULT_RESPONSE_FORMAT): string {
	return responses.map((response) => encodeResponse(response, format)).join("");
}

/**
 * Information text or unsolicited result code framing.
 */
export function encodeLine(line: string, format: AtResponseFormat = DEFAULT_RESPONSE_FORMAT): string {
	return format.verbose ? `\r\n${line}\r\n` : `${line}\r\n`;
}

function encodeStatus(status: string, format: AtResponseFormat): string {
	if (format.verbose)
		return `\r\n${status}\r\n`;
	if (Object.hasOwn(FINAL_RESULT_CODES, status))
		return sprintf("%d\r", FINAL_RESULT_CODES[status]);
	return `${status}\r\n`;
}

function isValidLine(line: string) {
	return typeof line == "string" && !/[\r\n]/.test(line);
}
