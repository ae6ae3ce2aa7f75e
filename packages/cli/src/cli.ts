#!/usr/bin/env node

/**
 * @workdeck/cli: Entry point.
 *
 * Wires the real process into {@link run} and sets the exit code.
 */

import { createLogger, NodeFileSystem } from "@workdeck/core";
import { run } from "./main.js";

const VERSION = "0.1.0";

const log = createLogger("cli");

try {
	process.exitCode = run(process.argv.slice(2), {
		out: {
			stdout: (text) => process.stdout.write(text),
			stderr: (text) => process.stderr.write(text),
		},
		fs: new NodeFileSystem(),
		env: process.env,
		now: () => new Date(),
		version: VERSION,
		isTTY: process.stdout.isTTY ?? false,
	});
} catch (error) {
	log.fatal("unexpected failure", error);
	process.exitCode = 1;
}
