import createDebug from 'debug';
import { AtCommand } from "./AtCommand.js";
import { AtErrorMode, cmeErrorStatus, CME_OPERATION_NOT_SUPPORTED, CME_UNKNOWN } from "./cme.js";
import { AtDialect, resolveDialect } from "./dialect.js";
import { AtCommandError, AtDispatchError, isParseErrorCode } from "./errors.js";
import { AtHandlerEntry, AtHandlerReturn, AtHandlerResult, AtRegistry } from "./AtRegistry.js";
import {
	AtResponse,
	AtResponseFormat,
	createResponse,
	encodeResponses,
	errorResponse,
	isResponse,
	isSuccessResponse,
	okResponse
} from "./AtResponse.js";
import { AtParsedCommand, parseLine } from "./parser.js";

const debug = createDebug('atcmd:dispatch');

// CONTINUE: every sub-command of a chained line gets its own response.
// ABORT: one response per line, the first final result other than OK ends the line.
export type AtChainPolicy = "CONTINUE" | "ABORT";

export type AtSessionSettings = {
	echo: boolean;
	verbose: boolean;
	quiet: boolean;
	errorMode: AtErrorMode;
};

export type AtDispatcherOptions = {
	registry?: AtRegistry;
	dialect?: Partial<AtDialect>;
	chainPolicy?: AtChainPolicy;
	session?: Partial<AtSessionSettings>;
	onUnsolicited?: (line: string) => void;
};

export const DEFAULT_SESSION_SETTINGS: Readonly<AtSessionSettings> = Object.freeze({
	echo: true,
	verbose: true,
	quiet: false,
	errorMode: "OFF",
});

export class AtDispatcher {
	readonly registry: AtRegistry;
	readonly dialect: AtDialect;
	readonly session: AtSessionSettings;
	private readonly defaultSession: AtSessionSettings;
	private readonly chainPolicy: AtChainPolicy;
	private readonly onUnsolicited?: (line: string) => void;
	private lastCommand: AtCommand | undefined;

	constructor(options: AtDispatcherOptions = {}) {
		this.dialect = resolveDialect(options.dialect);
		this.registry = options.registry ?? new AtRegistry({ caseInsensitive: this.dialect.caseInsensitive });
		this.chainPolicy = options.chainPolicy ?? "CONTINUE";
		this.onUnsolicited = options.onUnsolicited;
		this.defaultSession = { ...DEFAULT_SESSION_SETTINGS, ...options.session };
		this.session = { ...this.defaultSession };
	}

	/**
	 * Handles one complete line. Commands produce at least one response, non-command lines
	 * go to the unsolicited sink and produce none.
	 */
	async handle(line: string): Promise<AtResponse[]> {
		const parsed = parseLine(line, this.dialect);
		switch (parsed.kind) {
			case "EMPTY":
				return [];

			case "UNSOLICITED":
				debug(`AT -- ${line}`);
				this.onUnsolicited?.(line);
				return [];

			case "REPEAT":
				if (!this.lastCommand)
					return [this.failure({ code: "NotFound", message: "No previous command to repeat" })];
				debug(`AT >> A/ (${this.lastCommand.raw})`);
				return [await this.dispatch(this.lastCommand)];

			case "COMMANDS":
				if (parsed.commands.length == 0)
					return [okResponse()];
				if (this.chainPolicy == "ABORT")
					return [await this.handleAbortOnError(parsed.commands)];
				return this.handleEach(parsed.commands);
		}
	}

	/**
	 * Same as handle(), rendered in the session's result code format.
	 */
	async process(line: string): Promise<string> {
		return encodeResponses(await this.handle(line), this.responseFormat());
	}

	async dispatch(command: AtCommand): Promise<AtResponse> {
		debug(`AT >> ${command.raw || command.name} [${command.type}]`);

		const entry = this.registry.lookup(command.name);
		if (!entry)
			return this.failure({ code: "NotFound", message: `No handler for ${command.name}` });

		if (!entry.types.has(command.type)) {
			return this.failure({
				code: "CapabilityMismatch",
				message: `${command.name} does not support ${command.type}`,
			});
		}

		let response: AtResponse;
		try {
			response = toResponse(await invokeHandler(entry, command));
		} catch (e) {
			return this.failure(handlerFailure(command, e));
		}

		if (isSuccessResponse(response))
			this.lastCommand = command;
		for (const line of response.lines)
			debug(`AT << ${line}`);
		debug(`AT << ${response.status}`);
		return response;
	}

	responseFormat(): AtResponseFormat {
		return { verbose: this.session.verbose, quiet: this.session.quiet };
	}

	resetSession() {
		Object.assign(this.session, this.defaultSession);
	}

	getLastCommand(): AtCommand | undefined {
		return this.lastCommand;
	}

	private async handleEach(commands: AtParsedCommand[]): Promise<AtResponse[]> {
		const responses: AtResponse[] = [];
		for (const parsed of commands)
			responses.push(await this.dispatchParsed(parsed));
		return responses;
	}

	private async handleAbortOnError(commands: AtParsedCommand[]): Promise<AtResponse> {
		const lines: string[] = [];
		for (const parsed of commands) {
			const response = await this.dispatchParsed(parsed);
			lines.push(...response.lines);
			if (response.error || response.status != "OK")
				return createResponse(lines, response.status, response.error);
		}
		return createResponse(lines, "OK");
	}

	private async dispatchParsed(parsed: AtParsedCommand): Promise<AtResponse> {
		if (!parsed.success) {
			debug(`AT >> ${parsed.raw} [${parsed.error.code}]`);
			return this.failure(parsed.error);
		}
		return this.dispatch(parsed.command);
	}

	private failure(error: AtDispatchError): AtResponse {
		debug(`AT !! ${error.code}: ${error.message}`);
		return errorResponse(error, this.errorStatus(error));
	}

	private errorStatus(error: AtDispatchError): string {
		const mode = this.session.errorMode;
		if (mode == "OFF" || isParseErrorCode(error.code))
			return "ERROR";
		if (error.code == "HandlerFailure")
			return cmeErrorStatus(error.cme ?? CME_UNKNOWN, mode);
		return cmeErrorStatus(CME_OPERATION_NOT_SUPPORTED, mode);
	}
}

function invokeHandler(entry: AtHandlerEntry, command: AtCommand): AtHandlerReturn {
	const { capabilities } = entry;
	switch (command.type) {
		case "TEST":
			return capabilities.test?.(command);
		case "READ":
			return capabilities.read?.(command);
		case "SET":
			return capabilities.set?.(command.parameters, command);
		case "EXECUTE":
			return capabilities.execute?.(command.parameters, command);
	}
}

function toResponse(result: AtHandlerResult): AtResponse {
	if (typeof result == "string")
		return okResponse([result]);
	if (Array.isArray(result))
		return okResponse(result);
	if (isResponse(result))
		return createResponse(result.lines, result.status, result.error);
	return okResponse();
}

function handlerFailure(command: AtCommand, e: unknown): AtDispatchError {
	if (e instanceof AtCommandError)
		return { code: "HandlerFailure", message: `${command.name}: ${e.message}`, cme: e.cme };
	const message = e instanceof Error ? e.message : String(e);
	return { code: "HandlerFailure", message: `${command.name}: ${message}` };
}
