export type LogLevel = "debug" | "info" | "warn" | "error";

const levels: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Sink for structural events of a tree (splits, rotations, merges, height changes). */
export interface TreeLogger {
	debug(event: string, data?: Record<string, unknown>): void;
	info(event: string, data?: Record<string, unknown>): void;
	warn(event: string, data?: Record<string, unknown>): void;
	error(event: string, data?: Record<string, unknown>): void;
}

/** Level named by LOG_LEVEL; info when unset or unrecognized. */
export function levelFromEnv(value = process.env.LOG_LEVEL): LogLevel {
	return levels.find(level => level === value) ?? "info";
}

/** Writes each event at or above the threshold to stderr as one JSON object per line. */
export class ConsoleLogger implements TreeLogger {
	readonly threshold: LogLevel;

	constructor(threshold?: LogLevel) {
		this.threshold = threshold ?? levelFromEnv();
	}

	debug(event: string, data?: Record<string, unknown>) { this.write("debug", event, data); }
	info(event: string, data?: Record<string, unknown>) { this.write("info", event, data); }
	warn(event: string, data?: Record<string, unknown>) { this.write("warn", event, data); }
	error(event: string, data?: Record<string, unknown>) { this.write("error", event, data); }

	private write(level: LogLevel, event: string, data?: Record<string, unknown>) {
		if (levels.indexOf(level) < levels.indexOf(this.threshold)) {
			return;
		}
		console.error(JSON.stringify({ ts: new Date().toISOString(), level, event, ...data }));
	}
}
