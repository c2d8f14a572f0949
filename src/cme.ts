import fs from "node:fs";
import { sprintf } from "sprintf-js";

// +CMEE=<n>
export type AtErrorMode = "OFF" | "NUMERIC" | "VERBOSE";

export const CME_OPERATION_NOT_SUPPORTED = 4;
export const CME_INCORRECT_PARAMETERS = 50;
export const CME_UNKNOWN = 100;

const CME_ERRORS_FILE = new URL("../data/cme-errors.json", import.meta.url);

let cmeErrorTexts: Map<number, string> | undefined;

export function cmeErrorText(code: number): string | undefined {
	cmeErrorTexts ||= loadCmeErrorTexts();
	return cmeErrorTexts.get(code);
}

export function cmeErrorStatus(code: number, mode: Exclude<AtErrorMode, "OFF">): string {
	if (mode == "VERBOSE") {
		const text = cmeErrorText(code);
		if (text)
			return `+CME ERROR: ${text}`;
	}
	return sprintf("+CME ERROR: %d", code);
}

function loadCmeErrorTexts(): Map<number, string> {
	const table: unknown = JSON.parse(fs.readFileSync(CME_ERRORS_FILE, "utf-8"));
	if (typeof table != "object" || table == null)
		throw new Error(`${CME_ERRORS_FILE.pathname}: expected an object`);

	const texts = new Map<number, string>();
	for (const [code, text] of Object.entries(table)) {
		if (!/^\d+$/.test(code) || typeof text != "string")
			throw new Error(`${CME_ERRORS_FILE.pathname}: invalid entry ${code}`);
		texts.set(Number(code), text);
	}
	return texts;
}
