import { describe, it, expect } from "vitest";
import { COMMANDS, helpText, parseArgs } from "../src/args.js";

// ═══════════════════════════════════════════════════════════════════════════════
// parseArgs
// ═══════════════════════════════════════════════════════════════════════════════

describe("parseArgs", () => {
	// ─── Empty args ──────────────────────────────────────────────────────────

	describe("empty arguments", () => {
		it("should return only empty rest and unknown lists", () => {
			const args = parseArgs([]);
			expect(args).toEqual({ rest: [], unknown: [] });
		});
	});

	// ─── Commands ────────────────────────────────────────────────────────────

	describe("commands", () => {
		it("should take the first positional as the command", () => {
			const args = parseArgs(["list-projects", "web", "app"]);
			expect(args.command).toBe("list-projects");
			expect(args.rest).toEqual(["web", "app"]);
		});

		it("should accept flags before and after the command", () => {
			const args = parseArgs(["--json", "doctor", "--no-color"]);
			expect(args.command).toBe("doctor");
			expect(args.json).toBe(true);
			expect(args.noColor).toBe(true);
			expect(args.rest).toEqual([]);
		});

		it("should stop reading flags after --", () => {
			const args = parseArgs(["list-projects", "--", "--json"]);
			expect(args.json).toBeUndefined();
			expect(args.rest).toEqual(["--json"]);
		});

		it("should treat a lone dash as a positional", () => {
			expect(parseArgs(["list-projects", "-"]).rest).toEqual(["-"]);
		});
	});

	// ─── Boolean flags ───────────────────────────────────────────────────────

	describe("boolean flags", () => {
		it("should parse -v and --version", () => {
			expect(parseArgs(["-v"]).version).toBe(true);
			expect(parseArgs(["--version"]).version).toBe(true);
		});

		it("should parse -h and --help", () => {
			expect(parseArgs(["-h"]).help).toBe(true);
			expect(parseArgs(["--help"]).help).toBe(true);
		});

		it("should collect unknown flags in order", () => {
			expect(parseArgs(["-x", "doctor", "--verbose"]).unknown).toEqual(["-x", "--verbose"]);
		});
	});

	// ─── --config ────────────────────────────────────────────────────────────

	describe("--config", () => {
		it("should read the next argument as the path", () => {
			const args = parseArgs(["--config", "/tmp/c.toml", "doctor"]);
			expect(args.configPath).toBe("/tmp/c.toml");
			expect(args.command).toBe("doctor");
		});

		it("should accept --config=<path>", () => {
			expect(parseArgs(["doctor", "--config=/tmp/c.toml"]).configPath).toBe("/tmp/c.toml");
		});

		it("should report a missing path", () => {
			const args = parseArgs(["doctor", "--config"]);
			expect(args.error).toBe("--config requires a path");
			expect(args.configPath).toBeUndefined();
		});

		it("should report an empty inline path", () => {
			expect(parseArgs(["--config="]).error).toBe("--config requires a path");
		});
	});
});

// ═══════════════════════════════════════════════════════════════════════════════
// helpText
// ═══════════════════════════════════════════════════════════════════════════════

describe("helpText", () => {
	it("should list every command", () => {
		const text = helpText();
		for (const command of COMMANDS) {
			expect(text).toContain(`  ${command}`);
		}
	});

	it("should end with a newline", () => {
		expect(helpText().endsWith("\n")).toBe(true);
	});
});
