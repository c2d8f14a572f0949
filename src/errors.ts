export type AtParseErrorCode =
	| "MalformedCommand"
	| "UnterminatedQuote"
	| "UnexpectedParameters"
	| "MissingParameters";

export type AtDispatchErrorCode =
	| AtParseErrorCode
	| "NotFound"
	| "CapabilityMismatch"
	| "HandlerFailure";

export type AtParseError = {
	code: AtParseErrorCode;
	message: string;
};

export type AtDispatchError = {
	code: AtDispatchErrorCode;
	message: string;
	cme?: number;
};

export type AtResult<Payload> =
	| ({ success: true } & Payload)
	| { success: false; error: AtParseError };

export function parseError(code: AtParseErrorCode, message: string): { success: false; error: AtParseError } {
	return { success: false, error: { code, message } };
}

export function isParseErrorCode(code: AtDispatchErrorCode): code is AtParseErrorCode {
	return code == "MalformedCommand" || code == "UnterminatedQuote" ||
		code == "UnexpectedParameters" || code == "MissingParameters";
}

/**
 * Thrown by command handlers to fail a command, optionally with a +CME ERROR code.
 */
export class AtCommandError extends Error {
	readonly cme?: number;

	constructor(message: string, cme?: number) {
		super(message);
		this.name = "AtCommandError";
		this.cme = cme;
	}
}

export type AtRegistryErrorCode = "DuplicateHandler" | "InvalidHandler";

export class AtRegistryError extends Error {
	readonly code: AtRegistryErrorCode;

	constructor(code: AtRegistryErrorCode, message: string) {
		super(message);
		this.name = "AtRegistryError";
		this.code = code;
	}
}
