import { AtCommand, AtParameter, createCommand } from "./AtCommand.js";
import { classifyCommand } from "./classifier.js";
import { AtDialect, DEFAULT_DIALECT } from "./dialect.js";
import { AtResult } from "./errors.js";
import { decodeParameters } from "./parameters.js";
import { AtToken, tokenize } from "./tokenizer.js";

export type AtParsedCommand = AtResult<{ command: AtCommand }> & { raw: string };

export type AtParsedLine =
	| { kind: "EMPTY" | "REPEAT" | "UNSOLICITED"; raw: string }
	| { kind: "COMMANDS"; raw: string; commands: AtParsedCommand[] };

export function parseLine(line: string, dialect: AtDialect = DEFAULT_DIALECT): AtParsedLine {
	const tokenized = tokenize(line, dialect);
	if (tokenized.kind != "COMMANDS")
		return tokenized;

	const commands = tokenized.commands.map((result): AtParsedCommand => {
		if (!result.success)
			return result;
		return parseToken(result.token, dialect);
	});
	return { kind: "COMMANDS", raw: line, commands };
}

export function parseToken(token: AtToken, dialect: AtDialect = DEFAULT_DIALECT): AtParsedCommand {
	const classified = classifyCommand(token, dialect);
	if (!classified.success)
		return { ...classified, raw: token.raw };

	let parameters: AtParameter[] = [];
	if (token.verbatim) {
		if (token.tail.length > 0)
			parameters = [{ type: "TOKEN", value: token.tail }];
	} else if (classified.type == "SET" || token.tail.trim().length > 0) {
		const decoded = decodeParameters(token.tail);
		if (!decoded.success)
			return { ...decoded, raw: token.raw };
		parameters = decoded.parameters;
	}

	return {
		success: true,
		raw: token.raw,
		command: createCommand(token.name, classified.type, parameters, token.raw),
	};
}
