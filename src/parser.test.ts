import { describe, expect, test } from 'vitest';
import { AtCommand, atInteger, atOmitted, atString, atToken, createCommand } from "./AtCommand.js";
import { encodeCommand } from "./encoder.js";
import { decodeParameters } from "./parameters.js";
import { AtParsedCommand, parseLine } from "./parser.js";

function parsedCommands(line: string): AtParsedCommand[] {
	const parsed = parseLine(line);
	if (parsed.kind != "COMMANDS")
		throw new Error(`Expected a command line, got ${parsed.kind}`);
	return parsed.commands;
}

function command(line: string): AtCommand {
	const [result] = parsedCommands(line);
	if (!result.success)
		throw new Error(result.error.message);
	return result.command;
}

describe('parseLine', () => {
	test('should determine the command type', () => {
		expect(command("AT+CSQ=?")).toEqual({ name: "+CSQ", type: "TEST", parameters: [], raw: "+CSQ=?" });
		expect(command("AT+CSQ?")).toEqual({ name: "+CSQ", type: "READ", parameters: [], raw: "+CSQ?" });
		expect(command("AT+CSQ=1,2")).toEqual({
			name: "+CSQ",
			type: "SET",
			parameters: [atInteger(1), atInteger(2)],
			raw: "+CSQ=1,2",
		});
		expect(command("AT+CSQ")).toEqual({ name: "+CSQ", type: "EXECUTE", parameters: [], raw: "+CSQ" });
	});

	test('should decode quoted parameters', () => {
		expect(command('AT+CPIN="1234",,"abc""def"').parameters).toEqual([
			atString("1234"),
			atOmitted(),
			atString('abc"def'),
		]);
	});

	test('should give an empty SET one omitted parameter', () => {
		expect(command("AT+CSQ=").parameters).toEqual([atOmitted()]);
	});

	test('should decode basic command arguments', () => {
		expect(command("ATE").parameters).toEqual([]);
		expect(command("ATE1").parameters).toEqual([atInteger(1)]);
		expect(command("ATS0=2")).toEqual({ name: "S0", type: "SET", parameters: [atInteger(2)], raw: "S0=2" });
		expect(command("ATDT+49123;")).toEqual({
			name: "D",
			type: "EXECUTE",
			parameters: [atToken("T+49123;")],
			raw: "DT+49123;",
		});
	});

	test('should report decoding errors with the raw command', () => {
		expect(parsedCommands('AT+CSQ;+X="abc')).toEqual([
			expect.objectContaining({ success: true }),
			{
				success: false,
				raw: '+X="abc',
				error: { code: "UnterminatedQuote", message: 'Unterminated quoted string in ""abc"' },
			},
		]);
	});

	test('should pass non-command lines through', () => {
		expect(parseLine("OK")).toEqual({ kind: "UNSOLICITED", raw: "OK" });
		expect(parseLine("A/")).toEqual({ kind: "REPEAT", raw: "A/" });
	});

	test('should return equal, frozen commands for the same line', () => {
		const line = 'AT+CMGS="+4912345",145;+CSQ';
		expect(parseLine(line)).toEqual(parseLine(line));

		const cmd = command(line);
		expect(Object.isFrozen(cmd)).toBe(true);
		expect(Object.isFrozen(cmd.parameters)).toBe(true);
	});

	test('should read back encoded commands', () => {
		const cmd = createCommand("+CPBW", "SET", [
			atInteger(1),
			atString("+4912"),
			atInteger(145),
			atString('Jo "J"'),
			atOmitted(),
		]);
		const line = encodeCommand(cmd);
		expect(line).toBe('AT+CPBW=1,"+4912",145,"Jo ""J""",');
		expect(command(line).parameters).toEqual(cmd.parameters);
	});

	test('should quote tokens that would change the command when written bare', () => {
		for (const value of ["?", "a;b", "?x"]) {
			const decoded = decodeParameters(value);
			if (!decoded.success)
				throw new Error(decoded.error.message);
			expect(decoded.parameters).toEqual([atToken(value)]);

			const line = encodeCommand(createCommand("+X", "SET", decoded.parameters));
			expect(line).toBe(`AT+X="${value}"`);
			expect(parsedCommands(line)).toHaveLength(1);
			expect(command(line)).toEqual({ name: "+X", type: "SET", parameters: [atString(value)], raw: `+X="${value}"` });
		}
	});

	test('should keep a "?" token bare after the first parameter', () => {
		const cmd = createCommand("+X", "SET", [atInteger(1), atToken("?")]);
		expect(encodeCommand(cmd)).toBe("AT+X=1,?");
		expect(command("AT+X=1,?").parameters).toEqual(cmd.parameters);
	});
});
