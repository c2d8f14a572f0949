import { SerialPort } from "serialport";
import { AsyncSerialPort } from "../src/index.js";

export async function openPort(path: string, baudRate: number) {
	const port = new AsyncSerialPort(new SerialPort({
		path,
		baudRate,
		autoOpen: false
	}));
	await port.open();
	return port;
}
