import { EventEmitter } from 'node:events';
import { afterEach, describe, expect, test, vi } from 'vitest';
import { AtChannel, AtPort, AtPortEvents } from "./AtChannel.js";
import { AtDispatcher, AtDispatcherOptions } from "./AtDispatcher.js";

class FakePort implements AtPort {
	readonly written: string[] = [];
	failNext = false;
	private readonly events = new EventEmitter();

	on<E extends keyof AtPortEvents>(event: E, listener: (...args: AtPortEvents[E]) => void) {
		this.events.on(event, listener);
		return this;
	}

	off<E extends keyof AtPortEvents>(event: E, listener: (...args: AtPortEvents[E]) => void) {
		this.events.off(event, listener);
		return this;
	}

	async write(data: string) {
		if (this.failNext) {
			this.failNext = false;
			throw new Error("write failed");
		}
		this.written.push(data);
	}

	receive(data: string) {
		this.events.emit("data", Buffer.from(data));
	}

	close() {
		this.events.emit("close");
	}
}

function createChannel(options: AtDispatcherOptions = {}, maxLineLength?: number) {
	const port = new FakePort();
	const dispatcher = new AtDispatcher(options);
	dispatcher.registry.register("+CSQ", { read: () => "+CSQ: 15,99" });
	const channel = new AtChannel(port, dispatcher, { maxLineLength });
	channel.start();
	return { port, dispatcher, channel };
}

describe('AtChannel', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	test('should echo the command and write the response', async () => {
		const { port, channel } = createChannel();
		port.receive("AT+CSQ?\r");
		await channel.idle();
		expect(port.written).toEqual(["AT+CSQ?\r", "\r\n+CSQ: 15,99\r\n\r\nOK\r\n"]);
	});

	test('should assemble lines from fragments', async () => {
		const { port, channel } = createChannel({ session: { echo: false } });
		port.receive("AT+C");
		port.receive("SQ?");
		await channel.idle();
		expect(port.written).toEqual([]);

		port.receive("\r\n");
		await channel.idle();
		expect(port.written).toEqual(["\r\n+CSQ: 15,99\r\n\r\nOK\r\n"]);
	});

	test('should answer lines in order', async () => {
		const { port, dispatcher, channel } = createChannel({ session: { echo: false } });
		dispatcher.registry.register("+SLOW", {
			async execute() {
				await new Promise((resolve) => setTimeout(resolve, 10));
				return "slow";
			}
		});

		port.receive("AT+SLOW\rAT\r");
		await channel.idle();
		expect(port.written).toEqual(["\r\nslow\r\n\r\nOK\r\n", "\r\nOK\r\n"]);
	});

	test('should not answer unsolicited lines', async () => {
		const onUnsolicited = vi.fn();
		const { port, channel } = createChannel({ onUnsolicited });
		port.receive("RING\r\n");
		await channel.idle();
		expect(port.written).toEqual([]);
		expect(onUnsolicited).toHaveBeenCalledWith("RING");
	});

	test('should send unsolicited result codes in the session format', async () => {
		const { port, dispatcher, channel } = createChannel();
		await channel.notify("+CREG: 1");
		dispatcher.session.verbose = false;
		await channel.notify("+CREG: 2");
		expect(port.written).toEqual(["\r\n+CREG: 1\r\n", "+CREG: 2\r\n"]);
	});

	test('should stop reading when stopped or closed', async () => {
		const { port, channel } = createChannel({ session: { echo: false } });
		channel.start();
		port.receive("AT\r");
		await channel.idle();
		expect(port.written).toEqual(["\r\nOK\r\n"]);

		channel.stop();
		port.receive("AT\r");
		await channel.idle();
		expect(port.written).toHaveLength(1);

		channel.start();
		port.close();
		port.receive("AT\r");
		await channel.idle();
		expect(port.written).toHaveLength(1);
	});

	test('should reject lines that are too long', async () => {
		const { port, channel } = createChannel({ session: { echo: false } }, 8);
		port.receive("AT+CSQ?;+CSQ?");
		port.receive("+CSQ?\r");
		port.receive("AT\r");
		await channel.idle();
		expect(port.written).toEqual(["\r\nERROR\r\n", "\r\nOK\r\n"]);
	});

	test('should reject a long line that arrives in one chunk', async () => {
		const { port, channel } = createChannel({ session: { echo: false } }, 8);
		port.receive("AT+CSQ?;+CSQ?\rAT\r");
		await channel.idle();
		expect(port.written).toEqual(["\r\nERROR\r\n", "\r\nOK\r\n"]);
	});

	test('should keep working after a failed write', async () => {
		const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
		const { port, channel } = createChannel({ session: { echo: false } });
		port.failNext = true;
		port.receive("AT\rAT\r");
		await channel.idle();
		expect(error).toHaveBeenCalledWith("[AtChannel]", expect.any(Error));
		expect(port.written).toEqual(["\r\nOK\r\n"]);
	});
});
