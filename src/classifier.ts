import { AtCommandType } from "./AtCommand.js";
import { AtDialect, DEFAULT_DIALECT } from "./dialect.js";
import { AtResult, parseError } from "./errors.js";
import { AtToken, AtTypeMarker } from "./tokenizer.js";

export type AtClassification = AtResult<{ type: AtCommandType }>;

const MARKER_TYPES: Record<AtTypeMarker, AtCommandType> = {
	"=?": "TEST",
	"?": "READ",
	"=": "SET",
	"": "EXECUTE",
};

export function commandTypeFromMarker(marker: AtTypeMarker): AtCommandType {
	return MARKER_TYPES[marker];
}

export function classifyCommand(token: AtToken, dialect: AtDialect = DEFAULT_DIALECT): AtClassification {
	const type = commandTypeFromMarker(token.marker);
	const hasTail = token.tail.trim().length > 0;

	switch (type) {
		case "TEST":
		case "READ":
			if (hasTail)
				return parseError("UnexpectedParameters", `${token.name}: ${type} command takes no parameters`);
		break;

		case "SET":
			if (token.tail.length == 0 && dialect.strictEmptySet)
				return parseError("MissingParameters", `${token.name}: missing parameters after "="`);
		break;

		case "EXECUTE":
			if (hasTail && !token.basic && !dialect.executeParameters)
				return parseError("UnexpectedParameters", `${token.name}: unexpected "${token.tail}" after command name`);
		break;
	}

	return { success: true, type };
}
