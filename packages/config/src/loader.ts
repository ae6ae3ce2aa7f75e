/**
 * Config loader: bootstrap a missing file, read an existing one, parse it.
 *
 * I/O failures come back as {@link ConfigError}; everything about the
 * content of a file that was read is a finding on the {@link ConfigLoadResult}.
 */

import os from "node:os";
import path from "node:path";
import { ConfigError, createLogger, describeError, err, NodeFileSystem, ok } from "@workdeck/core";
import type { FileSystem, Result } from "@workdeck/core";
import { findingsOf } from "./findings.js";
import { PARSE_ERROR_TITLE, parseConfig } from "./parser.js";
import { STARTER_CONFIG } from "./starter.js";
import type { Config, ConfigLoadResult, Finding } from "./types.js";

const log = createLogger("config:loader");

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Default config location:
 * `$WORKDECK_CONFIG`, else `$XDG_CONFIG_HOME/workdeck/config.toml`,
 * else `~/.config/workdeck/config.toml`.
 */
export function defaultConfigPath(env: Environment = process.env): string {
	const override = env.WORKDECK_CONFIG?.trim();
	if (override) return override;

	const xdg = env.XDG_CONFIG_HOME?.trim();
	if (xdg) return path.join(xdg, "workdeck", "config.toml");

	const home = env.HOME || env.USERPROFILE || os.homedir();
	return path.join(home, ".config", "workdeck", "config.toml");
}

/**
 * Load and parse the config at `configPath`.
 *
 * A missing file is replaced by {@link STARTER_CONFIG} and reported as
 * `fileNotFound`, so the caller can tell the user where to edit.
 */
export function loadConfig(configPath: string, fs: FileSystem): Result<ConfigLoadResult, ConfigError> {
	if (!fs.exists(configPath)) {
		try {
			fs.createDirectory(path.dirname(configPath));
			fs.writeFile(configPath, new TextEncoder().encode(STARTER_CONFIG));
		} catch (error) {
			log.warn("could not write starter config", { path: configPath, error: describeError(error) });
			return err(new ConfigError(
				"createFailed",
				configPath,
				`Failed to create config at ${configPath}: ${describeError(error)}`,
				error,
			));
		}
		log.info("wrote starter config", { path: configPath });
		return err(new ConfigError(
			"fileNotFound",
			configPath,
			`Config file not found. Created a starter config at ${configPath}. Edit it to add projects.`,
		));
	}

	let bytes: Uint8Array;
	try {
		bytes = fs.readFile(configPath);
	} catch (error) {
		log.warn("could not read config", { path: configPath, error: describeError(error) });
		return err(new ConfigError(
			"readFailed",
			configPath,
			`Failed to read config at ${configPath}: ${describeError(error)}`,
			error,
		));
	}

	let text: string;
	try {
		text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
	} catch (error) {
		log.warn("config is not valid UTF-8", { path: configPath });
		return err(new ConfigError(
			"readFailed",
			configPath,
			`Failed to read config at ${configPath}: file is not valid UTF-8.`,
			error,
		));
	}

	const result = parseConfig(text);
	log.debug("parsed config", {
		path: configPath,
		projects: result.projects.length,
		warnings: findingsOf(result.findings, "WARN").length,
		failures: findingsOf(result.findings, "FAIL").length,
	});
	return ok(result);
}

/** {@link loadConfig} at {@link defaultConfigPath}. */
export function loadDefaultConfig(
	fs: FileSystem = new NodeFileSystem(),
	env: Environment = process.env,
): Result<ConfigLoadResult, ConfigError> {
	return loadConfig(defaultConfigPath(env), fs);
}

// ─── Strict Loading ──────────────────────────────────────────────────────────

export type ConfigLoadError =
	| { readonly kind: "fileNotFound"; readonly path: string; readonly message: string }
	| { readonly kind: "readFailed"; readonly path: string; readonly message: string; readonly cause: ConfigError }
	| { readonly kind: "parseFailed"; readonly path: string; readonly message: string; readonly detail: string }
	| {
		readonly kind: "validationFailed";
		readonly path: string;
		readonly message: string;
		readonly findings: readonly Finding[];
	};

/**
 * Load a config that must be fully valid: any FAIL finding is an error.
 * `createFailed` is reported as `readFailed`.
 */
export function loadConfigStrict(configPath: string, fs: FileSystem): Result<Config, ConfigLoadError> {
	const loaded = loadConfig(configPath, fs);
	if (!loaded.ok) {
		const error = loaded.error;
		if (error.kind === "fileNotFound") {
			return err({ kind: "fileNotFound", path: configPath, message: error.message });
		}
		return err({ kind: "readFailed", path: configPath, message: error.message, cause: error });
	}

	const result = loaded.value;
	if (result.hasParseError || result.config === undefined) {
		const parseFinding = result.findings.find((f) => f.title === PARSE_ERROR_TITLE);
		return err({
			kind: "parseFailed",
			path: configPath,
			message: `Config at ${configPath} is not valid TOML.`,
			detail: parseFinding?.detail ?? "",
		});
	}

	const failures = findingsOf(result.findings, "FAIL");
	if (failures.length > 0) {
		return err({
			kind: "validationFailed",
			path: configPath,
			message: `Config at ${configPath} has ${failures.length} validation ${failures.length === 1 ? "error" : "errors"}.`,
			findings: failures,
		});
	}

	return ok(result.config);
}
