export type AtDialect = {
	// Upper-case command names while tokenizing
	caseInsensitive: boolean;
	// "AT+X=" with nothing after "=" fails MissingParameters instead of yielding one omitted parameter
	strictEmptySet: boolean;
	// Extended commands without a marker may carry a parameter tail that can't be read as
	// part of the name ("AT+X\"a\",2", "AT+X,2")
	executeParameters: boolean;
	// Characters that open an extended command name
	extendedPrefixes: string;
	// Basic commands that take the rest of the line as a single verbatim token (dial strings)
	verbatimCommands: string[];
};

export const DEFAULT_DIALECT: Readonly<AtDialect> = Object.freeze({
	caseInsensitive: true,
	strictEmptySet: false,
	executeParameters: false,
	extendedPrefixes: "+^$%#*!",
	verbatimCommands: ["D"],
});

export function resolveDialect(dialect: Partial<AtDialect> = {}): AtDialect {
	return {
		...DEFAULT_DIALECT,
		verbatimCommands: [...DEFAULT_DIALECT.verbatimCommands],
		...dialect,
	};
}
