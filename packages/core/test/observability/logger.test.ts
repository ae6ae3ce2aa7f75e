import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
	resetLoggingConfig,
	parseLogLevel,
} from "@workdeck/core";
import type { LogEntry, LogTransport } from "@workdeck/core";

// ─── Test Transport ──────────────────────────────────────────────────────────

class TestTransport implements LogTransport {
	entries: LogEntry[] = [];
	write(entry: LogEntry): void {
		this.entries.push(entry);
	}
}

describe("Logger", () => {
	let transport: TestTransport;
	let savedEnvLevel: string | undefined;

	beforeEach(() => {
		transport = new TestTransport();
		savedEnvLevel = process.env.LOG_LEVEL;
		delete process.env.LOG_LEVEL;
		resetLoggingConfig();
	});

	afterEach(() => {
		if (savedEnvLevel === undefined) delete process.env.LOG_LEVEL;
		else process.env.LOG_LEVEL = savedEnvLevel;
		resetLoggingConfig();
	});

	describe("log level filtering", () => {
		it("should emit entries at or above the configured level", () => {
			const logger = new Logger("test", { level: LogLevel.INFO, transports: [transport] });
			logger.debug("hidden");
			logger.info("shown");
			logger.warn("also shown");
			expect(transport.entries.map((e) => e.message)).toEqual(["shown", "also shown"]);
		});

		it("should default to WARN", () => {
			const logger = new Logger("test", { transports: [transport] });
			expect(logger.getLevel()).toBe(LogLevel.WARN);
		});

		it("should let LOG_LEVEL override the configured level", () => {
			process.env.LOG_LEVEL = "debug";
			const logger = new Logger("test", { level: LogLevel.ERROR, transports: [transport] });
			expect(logger.getLevel()).toBe(LogLevel.DEBUG);
		});

		it("should ignore an unknown LOG_LEVEL", () => {
			process.env.LOG_LEVEL = "chatty";
			const logger = new Logger("test", { level: LogLevel.ERROR, transports: [transport] });
			expect(logger.getLevel()).toBe(LogLevel.ERROR);
		});
	});

	describe("entries", () => {
		it("should carry logger name, level name and merged context", () => {
			const logger = new Logger("config", {
				level: LogLevel.DEBUG,
				transports: [transport],
				defaultContext: { pid: 1 },
			});
			logger.info("loaded", { projects: 3 });
			const entry = transport.entries[0];
			expect(entry.logger).toBe("config");
			expect(entry.levelName).toBe("INFO");
			expect(entry.context).toEqual({ pid: 1, projects: 3 });
		});

		it("should serialize Error objects and plain values", () => {
			const logger = new Logger("t", { level: LogLevel.DEBUG, transports: [transport] });
			logger.error("failed", new TypeError("bad type"));
			logger.error("failed again", "just a string");
			expect(transport.entries[0].error?.name).toBe("TypeError");
			expect(transport.entries[0].error?.message).toBe("bad type");
			expect(transport.entries[1].error).toEqual({ name: "Error", message: "just a string" });
		});

		it("should keep going when a transport throws", () => {
			const broken: LogTransport = {
				write() {
					throw new Error("disk gone");
				},
			};
			const logger = new Logger("t", { level: LogLevel.DEBUG, transports: [broken, transport] });
			const originalWrite = process.stderr.write.bind(process.stderr);
			process.stderr.write = (() => true) as typeof process.stderr.write;
			try {
				logger.warn("still delivered");
			} finally {
				process.stderr.write = originalWrite;
			}
			expect(transport.entries).toHaveLength(1);
		});
	});

	describe("child and withContext", () => {
		it("should prefix child names and share transports", () => {
			const parent = new Logger("config", { level: LogLevel.DEBUG, transports: [transport] });
			parent.child("loader").info("hello");
			expect(transport.entries[0].logger).toBe("config:loader");
		});

		it("should not mutate the original logger", () => {
			const base = new Logger("a", { level: LogLevel.DEBUG, transports: [transport] });
			base.withContext({ path: "/x" }).info("one");
			base.info("two");
			expect(transport.entries[0].context).toEqual({ path: "/x" });
			expect(transport.entries[1].context).toEqual({});
		});
	});

	describe("global configuration", () => {
		it("should apply configured transports to new loggers", () => {
			configureLogging({ level: LogLevel.INFO, transports: [transport] });
			createLogger("global").info("via global");
			expect(transport.entries[0].message).toBe("via global");
		});
	});
});

describe("transports", () => {
	const entry: LogEntry = {
		timestamp: "2026-01-02T03:04:05.678Z",
		level: LogLevel.WARN,
		levelName: "WARN",
		message: "unknown key",
		context: { key: "colour" },
		logger: "config:parser",
	};

	it("should format a plain console line", () => {
		const lines: string[] = [];
		new ConsoleTransport({ colors: false, write: (l) => lines.push(l) }).write(entry);
		expect(lines).toEqual(['03:04:05.678 WARN  [config:parser] unknown key key="colour"\n']);
	});

	it("should format one JSON object per line", () => {
		const lines: string[] = [];
		new JsonTransport({ write: (l) => lines.push(l) }).write(entry);
		expect(JSON.parse(lines[0])).toEqual({
			timestamp: "2026-01-02T03:04:05.678Z",
			level: "WARN",
			logger: "config:parser",
			message: "unknown key",
			context: { key: "colour" },
		});
	});
});

describe("parseLogLevel", () => {
	it("should parse names case-insensitively", () => {
		expect(parseLogLevel("Error")).toBe(LogLevel.ERROR);
		expect(parseLogLevel(" debug ")).toBe(LogLevel.DEBUG);
		expect(parseLogLevel("loud")).toBeUndefined();
	});
});
