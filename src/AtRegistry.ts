import createDebug from 'debug';
import { AtCommand, AtCommandType, AtParameter } from "./AtCommand.js";
import { AtResponse } from "./AtResponse.js";
import { AtRegistryError } from "./errors.js";

const debug = createDebug('atcmd:registry');

export type AtHandlerResult = void | string | string[] | AtResponse;

export type AtHandlerReturn = AtHandlerResult | Promise<AtHandlerResult>;

export type AtCapabilities = {
	test?: (command: AtCommand) => AtHandlerReturn;
	read?: (command: AtCommand) => AtHandlerReturn;
	set?: (params: readonly AtParameter[], command: AtCommand) => AtHandlerReturn;
	execute?: (params: readonly AtParameter[], command: AtCommand) => AtHandlerReturn;
};

export type AtHandlerEntry = {
	readonly name: string;
	readonly types: ReadonlySet<AtCommandType>;
	readonly capabilities: Readonly<AtCapabilities>;
};

export type AtRegistryOptions = {
	caseInsensitive?: boolean;
};

const CAPABILITY_TYPES: Record<keyof AtCapabilities, AtCommandType> = {
	test: "TEST",
	read: "READ",
	set: "SET",
	execute: "EXECUTE",
};

export class AtRegistry {
	private readonly entries = new Map<string, AtHandlerEntry>();
	private readonly caseInsensitive: boolean;

	constructor(options: AtRegistryOptions = {}) {
		this.caseInsensitive = options.caseInsensitive ?? true;
	}

	register(name: string, capabilities: AtCapabilities): AtHandlerEntry {
		const key = this.key(name);
		if (this.entries.has(key))
			throw new AtRegistryError("DuplicateHandler", `Handler for ${key} is already registered`);
		return this.store(key, capabilities);
	}

	replace(name: string, capabilities: AtCapabilities): AtHandlerEntry {
		return this.store(this.key(name), capabilities);
	}

	unregister(name: string): void {
		if (this.entries.delete(this.key(name)))
			debug(`unregistered ${name}`);
	}

	lookup(name: string): AtHandlerEntry | undefined {
		return this.entries.get(this.key(name));
	}

	has(name: string): boolean {
		return this.entries.has(this.key(name));
	}

	names(): string[] {
		return [...this.entries.keys()];
	}

	private store(key: string, capabilities: AtCapabilities): AtHandlerEntry {
		if (key.length == 0)
			throw new AtRegistryError("InvalidHandler", "Command name is empty");

		const types = new Set<AtCommandType>();
		const copy: AtCapabilities = {};
		for (const [capability, callback] of Object.entries(capabilities)) {
			if (!isCapability(capability))
				throw new AtRegistryError("InvalidHandler", `${key}: unknown capability "${capability}"`);
			if (callback == null)
				continue;
			if (typeof callback != "function")
				throw new AtRegistryError("InvalidHandler", `${key}: capability "${capability}" is not a function`);
			types.add(CAPABILITY_TYPES[capability]);
		}

		if (capabilities.test) copy.test = capabilities.test;
		if (capabilities.read) copy.read = capabilities.read;
		if (capabilities.set) copy.set = capabilities.set;
		if (capabilities.execute) copy.execute = capabilities.execute;

		if (types.size == 0)
			throw new AtRegistryError("InvalidHandler", `${key}: handler implements no command type`);

		const entry: AtHandlerEntry = Object.freeze({
			name: key,
			types,
			capabilities: Object.freeze(copy),
		});
		this.entries.set(key, entry);
		debug(`registered ${key} [${[...types].join(", ")}]`);
		return entry;
	}

	private key(name: string) {
		return this.caseInsensitive ? name.toUpperCase() : name;
	}
}

function isCapability(name: string): name is keyof AtCapabilities {
	return Object.hasOwn(CAPABILITY_TYPES, name);
}
