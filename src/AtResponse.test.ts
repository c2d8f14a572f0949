import { describe, expect, test } from 'vitest';
import {
	createResponse,
	encodeLine,
	encodeResponse,
	encodeResponses,
	errorResponse,
	isErrorResult,
	isFinalResult,
	isSuccessResponse,
	okResponse
} from "./AtResponse.js";

const NUMERIC = { verbose: false, quiet: false };

describe('encodeResponse', () => {
	test('should frame every line with CR LF', () => {
		expect(encodeResponse(okResponse(["+CSQ: 15,99"]))).toBe("\r\n+CSQ: 15,99\r\n\r\nOK\r\n");
		expect(encodeResponse(okResponse())).toBe("\r\nOK\r\n");
		expect(encodeResponse(errorResponse({ code: "NotFound", message: "No handler" }))).toBe("\r\nERROR\r\n");
	});

	test('should use numeric result codes in non-verbose mode', () => {
		expect(encodeResponse(okResponse(["+CSQ: 15,99"]), NUMERIC)).toBe("+CSQ: 15,99\r\n0\r");
		expect(encodeResponse(createResponse([], "ERROR"), NUMERIC)).toBe("4\r");
		expect(encodeResponse(createResponse([], "NO CARRIER"), NUMERIC)).toBe("3\r");
		expect(encodeResponse(createResponse([], "+CME ERROR: 10"), NUMERIC)).toBe("+CME ERROR: 10\r\n");
	});

	test('should drop the final result in quiet mode', () => {
		expect(encodeResponse(okResponse(["+CSQ: 15,99"]), { verbose: true, quiet: true })).toBe("\r\n+CSQ: 15,99\r\n");
	});

	test('should concatenate several responses', () => {
		expect(encodeResponses([okResponse(["a"]), createResponse([], "ERROR")])).toBe("\r\na\r\n\r\nOK\r\n\r\nERROR\r\n");
		expect(encodeResponses([])).toBe("");
	});

	test('should frame unsolicited lines', () => {
		expect(encodeLine("RING")).toBe("\r\nRING\r\n");
		expect(encodeLine("RING", NUMERIC)).toBe("RING\r\n");
	});
});

describe('createResponse', () => {
	test('should reject line breaks and empty results', () => {
		expect(() => createResponse([], "")).toThrow(TypeError);
		expect(() => createResponse([], "OK\r\n")).toThrow(TypeError);
		expect(() => createResponse(["a\nb"], "OK")).toThrow(TypeError);
	});

	test('should keep the error cause', () => {
		const response = errorResponse({ code: "HandlerFailure", message: "failed", cme: 3 }, "+CME ERROR: 3");
		expect(response).toEqual({
			lines: [],
			status: "+CME ERROR: 3",
			error: { code: "HandlerFailure", message: "failed", cme: 3 },
		});
		expect(isSuccessResponse(response)).toBe(false);
		expect(isSuccessResponse(okResponse())).toBe(true);
		expect(isSuccessResponse(createResponse([], "ERROR"))).toBe(false);
		expect(isSuccessResponse(createResponse([], "NO CARRIER"))).toBe(true);
	});
});

describe('isFinalResult', () => {
	test('should recognize final result codes', () => {
		expect(isFinalResult("OK")).toBe(true);
		expect(isFinalResult("NO CARRIER")).toBe(true);
		expect(isFinalResult("+CME ERROR: 3")).toBe(true);
		expect(isFinalResult("+CMS ERROR: 500")).toBe(true);
		expect(isFinalResult("+CSQ: 15,99")).toBe(false);
		expect(isFinalResult("toString")).toBe(false);
	});

	test('should recognize error results', () => {
		expect(isErrorResult("ERROR")).toBe(true);
		expect(isErrorResult("+CME ERROR: 10")).toBe(true);
		expect(isErrorResult("+CMS ERROR: 500")).toBe(true);
		expect(isErrorResult("NO CARRIER")).toBe(false);
		expect(isErrorResult("OK")).toBe(false);
	});
});
