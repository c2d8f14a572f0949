export type AtCommandType = "TEST" | "READ" | "SET" | "EXECUTE";

export const AT_COMMAND_TYPES: readonly AtCommandType[] = ["TEST", "READ", "SET", "EXECUTE"];

export type AtParameter =
	| { type: "INTEGER"; value: number; width?: number }
	| { type: "STRING"; value: string }
	| { type: "TOKEN"; value: string }
	| { type: "OMITTED" };

export type AtCommand = {
	readonly name: string;
	readonly type: AtCommandType;
	readonly parameters: readonly AtParameter[];
	readonly raw: string;
};

export function atInteger(value: number, width?: number): AtParameter {
	return width != null ? { type: "INTEGER", value, width } : { type: "INTEGER", value };
}

export function atString(value: string): AtParameter {
	return { type: "STRING", value };
}

export function atToken(value: string): AtParameter {
	return { type: "TOKEN", value };
}

export function atOmitted(): AtParameter {
	return { type: "OMITTED" };
}

export function createCommand(name: string, type: AtCommandType, parameters: AtParameter[] = [], raw = ""): AtCommand {
	return Object.freeze({
		name,
		type,
		parameters: Object.freeze(parameters.map((p) => Object.freeze({ ...p }))),
		raw,
	});
}

/**
 * Plain value of a parameter: number for INTEGER, string for STRING and TOKEN, undefined for OMITTED.
 */
export function parameterValue(param: AtParameter | undefined): number | string | undefined {
	if (!param || param.type == "OMITTED")
		return undefined;
	return param.value;
}
