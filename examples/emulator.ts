import { parseArgs } from 'node:util';
import {
	AtChannel,
	AtCommandError,
	AtDispatcher,
	parameterValue,
	registerSessionCommands
} from "../src/index.js";
import { openPort } from "./utils.js";

const { values: argv } = parseArgs({
	options: {
		port: {
			type: "string",
			default: "/dev/ttyUSB0"
		},
		baudrate: {
			type: "string",
			default: "115200"
		},
		help: {
			type: "boolean",
			short: "h",
			default: false
		},
		usage: {
			type: "boolean",
			default: false
		}
	}
});

if (argv.help || argv.usage) {
	console.log(`USAGE: emulator.js --port /dev/ttyUSB0 [--baudrate 115200]`);
	process.exit(0);
}

const dispatcher = new AtDispatcher({
	onUnsolicited: (line) => console.log(`[host] ${line}`),
});
registerSessionCommands(dispatcher);

let pin = "";
let registration = 0;

dispatcher.registry.register("I", {
	execute: () => ["Virtual modem", "Revision 1.0"],
});

dispatcher.registry.register("+CGMI", {
	execute: () => "Virtual",
	test: () => undefined,
});

dispatcher.registry.register("+CSQ", {
	execute: () => "+CSQ: 15,99",
	test: () => "+CSQ: (0-31,99),(0-7,99)",
});

dispatcher.registry.register("+CPIN", {
	read: () => `+CPIN: ${pin ? "READY" : "SIM PIN"}`,
	set(params) {
		const value = parameterValue(params[0]);
		if (typeof value != "string" || !/^\d{4,8}$/.test(value))
			throw new AtCommandError("Invalid PIN", 16);
		pin = value;
	},
	test: () => undefined,
});

dispatcher.registry.register("+CREG", {
	read: () => `+CREG: ${registration},1`,
	set(params) {
		const value = parameterValue(params[0]);
		if (value !== 0 && value !== 1 && value !== 2)
			throw new AtCommandError("Invalid mode", 50);
		registration = value;
	},
	test: () => "+CREG: (0-2)",
});

dispatcher.registry.register("D", {
	execute(params) {
		const number = parameterValue(params[0]);
		if (!number)
			throw new AtCommandError("Empty dial string", 27);
		return { lines: [], status: "NO CARRIER" };
	},
});

const port = await openPort(argv.port, parseInt(argv.baudrate, 10));
const channel = new AtChannel(port, dispatcher);
channel.start();

console.log(`Listening on ${argv.port}, press Ctrl+C to exit.`);

process.on("SIGINT", () => {
	channel.stop();
	port.close().then(() => process.exit(0), (e: unknown) => {
		console.error(e);
		process.exit(1);
	});
});
