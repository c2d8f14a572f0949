import { sprintf } from "sprintf-js";

export function hexdump(buffer: Buffer) {
	const str: string[] = [];
	for (const byte of buffer)
		str.push(byte.toString(16).padStart(2, "0").toUpperCase());
	return str.join(" ");
}

/**
 * Printable form of a line for debug output: "AT\r\n" -> "AT\x0D\x0A"
 */
export function escapeLine(line: string) {
	return line.replace(/[\x00-\x1F\x7F]/g, (c) => sprintf("\\x%02X", c.charCodeAt(0)));
}

export function isPrintable(buffer: Buffer) {
	for (const byte of buffer) {
		if ((byte < 0x20 && byte != 0x0D && byte != 0x0A && byte != 0x09) || byte >= 0x7F)
			return false;
	}
	return true;
}
