import winston from "winston";

import { options } from "@covenant/shared/config/options";

const label = ["covenant"];

export const push = (l: string) => label.push(l);
export const pop = () => {
	if (label.length > 1) {
		label.pop();
	}
};

/** Runs `act` with `l` pushed on the label stack, popping it however `act` settles. */
export const scoped = async <A>(l: string, act: () => Promise<A>): Promise<A> => {
	push(l);
	try {
		return await act();
	} finally {
		pop();
	}
};

const labelled = winston.format(info => {
	const msg = `[${label.join(".")}] ${info.message}`;
	info[Symbol.for("message")] = msg.replace(/\n/g, " ");
	return info;
});

const transports = (): winston.transport[] => {
	const console = new winston.transports.Console({
		level: "debug",
		silent: !options.verbose,
		stderrLevels: ["error", "warn", "info", "debug"],
		format: labelled(),
	});
	if (!options.logFile) {
		return [console];
	}
	return [
		console,
		new winston.transports.File({
			filename: options.logFile,
			level: "debug",
			format: winston.format.combine(labelled(), winston.format.metadata()),
		}),
	];
};

export const logger = winston.createLogger({ level: "debug", transports: transports() });

/** Rebuilds the transports after `options` changed. */
export const configure = () => {
	logger.clear();
	transports().forEach(t => logger.add(t));
};
