import { SerialPortStream } from "@serialport/stream";
import { BindingInterface } from "@serialport/bindings-interface";
import { AtPort, AtPortEvents } from "./AtChannel.js";

/**
 * Promise API over a serialport stream, usable as the port of an AtChannel.
 */
export class AsyncSerialPort<T extends BindingInterface = BindingInterface> implements AtPort {
	private readonly port: SerialPortStream<T>;

	constructor(port: SerialPortStream<T>) {
		this.port = port;
	}

	on<E extends keyof AtPortEvents>(event: E, listener: (...args: AtPortEvents[E]) => void) {
		this.port.on(event, listener);
		return this;
	}

	off<E extends keyof AtPortEvents>(event: E, listener: (...args: AtPortEvents[E]) => void) {
		this.port.off(event, listener);
		return this;
	}

	get isOpen(): boolean {
		return this.port.isOpen;
	}

	get baudRate(): number {
		return this.port.baudRate;
	}

	async open(): Promise<void> {
		if (this.port.isOpen)
			return;
		return new Promise((resolve, reject) => {
			this.port.open((err) => {
				if (err) {
					reject(err);
				} else {
					resolve();
				}
			});
		});
	}

	async close(): Promise<void> {
		if (!this.port.isOpen)
			return;
		return new Promise((resolve, reject) => {
			this.port.close((err) => {
				if (err) {
					reject(err);
				} else {
					resolve();
				}
			});
		});
	}

	async write(data: string | Buffer): Promise<void> {
		if (!this.port.isOpen)
			throw new Error("Port is not open");
		return new Promise((resolve, reject) => {
			this.port.write(data, (err) => {
				if (err) {
					reject(err);
				} else {
					resolve();
				}
			});
		});
	}

	getParentPort(): SerialPortStream<T> {
		return this.port;
	}
}
