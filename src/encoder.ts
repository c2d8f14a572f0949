import { AtCommand } from "./AtCommand.js";
import { AtDialect, DEFAULT_DIALECT } from "./dialect.js";
import { encodeParameters } from "./parameters.js";
import { isNameChar } from "./tokenizer.js";

export function encodeCommand(command: AtCommand, dialect: AtDialect = DEFAULT_DIALECT): string {
	return `AT${encodeCommandBody(command, dialect)}`;
}

/**
 * Joins several commands into one command line: AT+CMEE=1;+CSQ
 * Dial-style commands swallow the rest of the line, so they may only come last.
 */
export function encodeCommandLine(commands: readonly AtCommand[], dialect: AtDialect = DEFAULT_DIALECT): string {
	commands.forEach((command, index) => {
		if (isVerbatimCommand(command, dialect) && index != commands.length - 1)
			throw new Error(`${command.name} must be the last command on the line`);
	});
	return `AT${commands.map((command) => encodeCommandBody(command, dialect)).join(";")}`;
}

export function encodeCommandBody(command: AtCommand, dialect: AtDialect = DEFAULT_DIALECT): string {
	switch (command.type) {
		case "TEST":
			return `${command.name}=?`;
		case "READ":
			return `${command.name}?`;
		case "SET":
			return `${command.name}=${encodeParameters(command.parameters)}`;
		case "EXECUTE":
			if (isVerbatimCommand(command, dialect)) {
				const [param] = command.parameters;
				return param && param.type != "OMITTED" ? `${command.name}${param.value}` : command.name;
			}
			return command.name + encodeExecuteParameters(command, dialect);
	}
}

// Nothing separates an extended name from its EXECUTE parameters, so they must not read as more of the name
function encodeExecuteParameters(command: AtCommand, dialect: AtDialect): string {
	const params = encodeParameters(command.parameters);
	if (params.length == 0 || !dialect.extendedPrefixes.includes(command.name.charAt(0)))
		return params;
	const first = params.charAt(0);
	if (isNameChar(first) || first == "=" || first == "?")
		throw new RangeError(`${command.name}: EXECUTE parameters can't start with "${first}"`);
	return params;
}

function isVerbatimCommand(command: AtCommand, dialect: AtDialect) {
	const name = command.name.toUpperCase();
	return dialect.verbatimCommands.some((v) => v.toUpperCase() == name);
}
