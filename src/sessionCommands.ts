import { AtParameter } from "./AtCommand.js";
import { AtDispatcher } from "./AtDispatcher.js";
import { AtErrorMode, CME_INCORRECT_PARAMETERS } from "./cme.js";
import { AtCommandError } from "./errors.js";

const ERROR_MODES: AtErrorMode[] = ["OFF", "NUMERIC", "VERBOSE"];

/*
 * Commands that only touch the dispatcher's session settings:
 *
 * ATE<n>		command echo
 * ATV<n>		0 - numeric result codes, 1 - verbose result codes
 * ATQ<n>		1 - don't send result codes
 * ATZ			restore default settings
 * AT+CMEE=<n>	0 - ERROR, 1 - +CME ERROR: <code>, 2 - +CME ERROR: <text>
 */
export function registerSessionCommands(dispatcher: AtDispatcher) {
	const { registry, session } = dispatcher;

	registry.register("E", {
		execute(params) {
			session.echo = readFlag(params, 1) == 1;
		}
	});

	registry.register("V", {
		execute(params) {
			session.verbose = readFlag(params, 1) == 1;
		}
	});

	registry.register("Q", {
		execute(params) {
			session.quiet = readFlag(params, 1) == 1;
		}
	});

	registry.register("Z", {
		execute(params) {
			readFlag(params, 0);
			dispatcher.resetSession();
		}
	});

	registry.register("+CMEE", {
		test: () => "+CMEE: (0-2)",
		read: () => `+CMEE: ${ERROR_MODES.indexOf(session.errorMode)}`,
		set(params) {
			if (params.length > 1)
				throw new AtCommandError("Too many parameters", CME_INCORRECT_PARAMETERS);
			session.errorMode = ERROR_MODES[readFlag(params, ERROR_MODES.length - 1)];
		},
	});
}

function readFlag(params: readonly AtParameter[], max: number): number {
	const [param] = params;
	if (!param || param.type == "OMITTED")
		return 0;
	if (param.type != "INTEGER" || param.value < 0 || param.value > max)
		throw new AtCommandError(`Value must be in range 0-${max}`, CME_INCORRECT_PARAMETERS);
	return param.value;
}
