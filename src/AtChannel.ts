import createDebug from 'debug';
import { AtDispatcher } from "./AtDispatcher.js";
import { encodeLine, encodeResponse, encodeResponses, errorResponse } from "./AtResponse.js";
import { escapeLine, hexdump, isPrintable } from "./utils.js";

const debug = createDebug('atcmd:channel');

export type AtPortEvents = {
	data: [data: Buffer];
	close: [];
};

export interface AtPort {
	on<E extends keyof AtPortEvents>(event: E, listener: (...args: AtPortEvents[E]) => void): unknown;
	off<E extends keyof AtPortEvents>(event: E, listener: (...args: AtPortEvents[E]) => void): unknown;
	write(data: string): Promise<void>;
}

export type AtChannelOptions = {
	// Longest command line kept in the input buffer, longer lines are discarded
	maxLineLength?: number;
};

/**
 * Device side of an AT link: frames command lines from the port, hands them to the
 * dispatcher one at a time and writes the responses back.
 */
export class AtChannel {
	private readonly port: AtPort;
	private readonly dispatcher: AtDispatcher;
	private readonly maxLineLength: number;
	private buffer = "";
	private overflow = false;
	private paused = true;
	private queue: Promise<void> = Promise.resolve();
	private readonly handleSerialDataCallback = this.handleSerialData.bind(this);
	private readonly handleSerialCloseCallback = this.handleSerialClose.bind(this);

	constructor(port: AtPort, dispatcher: AtDispatcher, options: AtChannelOptions = {}) {
		this.port = port;
		this.dispatcher = dispatcher;
		this.maxLineLength = options.maxLineLength ?? 2048;
	}

	private handleSerialClose() {
		this.stop();
	}

	private handleSerialData(data: Buffer) {
		debug(isPrintable(data) ? `RX ${escapeLine(data.toString())}` : `RX ${hexdump(data)}`);

		this.buffer += data.toString();

		let index: number;
		while ((index = this.buffer.search(/[\r\n]/)) >= 0) {
			const line = this.buffer.substring(0, index);
			this.buffer = this.buffer.substring(index + 1);

			if (this.overflow || line.length > this.maxLineLength) {
				this.overflow = false;
				this.enqueue(() => this.rejectLongLine());
				continue;
			}

			if (line.trim().length > 0) {
				this.enqueue(() => this.handleLine(line));
			}
		}

		if (this.buffer.length > this.maxLineLength) {
			debug(`Line is longer than ${this.maxLineLength} bytes, discarding`);
			this.buffer = "";
			this.overflow = true;
		}
	}

	private enqueue(task: () => Promise<void>) {
		this.queue = this.queue.then(task);
	}

	private async handleLine(line: string) {
		try {
			if (this.dispatcher.session.echo && /^\s*a[t/]/i.test(line))
				await this.port.write(`${line}\r`);

			const responses = await this.dispatcher.handle(line);
			if (responses.length > 0)
				await this.write(encodeResponses(responses, this.dispatcher.responseFormat()));
		} catch (e) {
			console.error(`[AtChannel]`, e);
		}
	}

	private async rejectLongLine() {
		const response = errorResponse({ code: "MalformedCommand", message: "Command line too long" });
		try {
			await this.write(encodeResponse(response, this.dispatcher.responseFormat()));
		} catch (e) {
			console.error(`[AtChannel]`, e);
		}
	}

	private async write(data: string) {
		debug(`TX ${escapeLine(data)}`);
		await this.port.write(data);
	}

	/**
	 * Sends an unsolicited result code (RING, +CREG: 1) between command responses.
	 */
	notify(line: string): Promise<void> {
		const task = this.queue.then(() => this.write(encodeLine(line, this.dispatcher.responseFormat())));
		this.queue = task.catch((e) => console.error(`[AtChannel]`, e));
		return task;
	}

	/**
	 * Resolves when every line received so far has been answered.
	 */
	idle(): Promise<void> {
		return this.queue;
	}

	start() {
		if (this.paused) {
			this.paused = false;
			this.port.on('data', this.handleSerialDataCallback);
			this.port.on('close', this.handleSerialCloseCallback);
		}
	}

	stop() {
		if (!this.paused) {
			this.paused = true;
			this.port.off('data', this.handleSerialDataCallback);
			this.port.off('close', this.handleSerialCloseCallback);
			this.buffer = "";
			this.overflow = false;
		}
	}
}
