import { describe, expect, test } from 'vitest';
import { escapeLine, hexdump, isPrintable } from "./utils.js";

describe('utils', () => {
	test('hexdump', () => {
		expect(hexdump(Buffer.from([0x41, 0x54, 0x0D]))).toBe("41 54 0D");
	});

	test('escapeLine', () => {
		expect(escapeLine("AT+CSQ?\r\n")).toBe("AT+CSQ?\\x0D\\x0A");
	});

	test('isPrintable', () => {
		expect(isPrintable(Buffer.from("AT\r\n"))).toBe(true);
		expect(isPrintable(Buffer.from([0x1B, 0x41]))).toBe(false);
	});
});
