/**
 * Logger interface compatible with console.
 * Each method echoes its first argument back as a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

type LogLevel = keyof Logger;

const toConsole =
	(level: LogLevel) =>
	(...args: unknown[]): string => {
		console[level](...args);
		return String(args[0] ?? "");
	};

/** Logger writing to the matching `console` method. Used unless one is given. */
export const defaultLogger: Logger = {
	debug: toConsole("debug"),
	log: toConsole("log"),
	warn: toConsole("warn"),
	error: toConsole("error"),
};
