import { describe, it, expect } from "vitest";
import { ConfigError, MemoryFileSystem } from "@workdeck/core";
import { defaultConfigPath, loadConfig, loadConfigStrict, loadDefaultConfig } from "../src/loader.js";
import { STARTER_CONFIG } from "../src/starter.js";

const CONFIG_PATH = "/home/test/.config/workdeck/config.toml";

const VALID = `
[layout]
maxGap = 4

[[project]]
name = "Alpha"
path = "/src/alpha"
color = "red"
`;

describe("defaultConfigPath", () => {
	it("should prefer WORKDECK_CONFIG", () => {
		expect(defaultConfigPath({ WORKDECK_CONFIG: "/custom/c.toml", XDG_CONFIG_HOME: "/xdg", HOME: "/home/test" }))
			.toBe("/custom/c.toml");
	});

	it("should fall back to XDG_CONFIG_HOME", () => {
		expect(defaultConfigPath({ WORKDECK_CONFIG: "  ", XDG_CONFIG_HOME: "/xdg", HOME: "/home/test" }))
			.toBe("/xdg/workdeck/config.toml");
	});

	it("should fall back to ~/.config", () => {
		expect(defaultConfigPath({ HOME: "/home/test" })).toBe(CONFIG_PATH);
	});
});

describe("loadConfig", () => {
	it("should write the starter config when the file is missing", () => {
		const fs = new MemoryFileSystem();
		const result = loadConfig(CONFIG_PATH, fs);

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error).toBeInstanceOf(ConfigError);
		expect(result.error.kind).toBe("fileNotFound");
		expect(result.error.path).toBe(CONFIG_PATH);
		expect(result.error.category).toBe("configuration");
		expect(result.error.message).toBe(
			`Config file not found. Created a starter config at ${CONFIG_PATH}. Edit it to add projects.`,
		);
		expect(fs.hasDirectory("/home/test/.config/workdeck")).toBe(true);
		expect(fs.readText(CONFIG_PATH)).toBe(STARTER_CONFIG);
	});

	it("should parse the starter config on the next load", () => {
		const fs = new MemoryFileSystem();
		loadConfig(CONFIG_PATH, fs);
		const second = loadConfig(CONFIG_PATH, fs);
		expect(second.ok).toBe(true);
		if (!second.ok) return;
		expect(second.value.hasParseError).toBe(false);
		expect(second.value.projects).toEqual([]);
	});

	it("should report createFailed when the directory cannot be created", () => {
		const fs = new MemoryFileSystem().failOn("createDirectory", "EACCES: permission denied");
		const result = loadConfig(CONFIG_PATH, fs);

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.kind).toBe("createFailed");
		expect(result.error.category).toBe("fileSystem");
		expect(result.error.message).toBe(`Failed to create config at ${CONFIG_PATH}: EACCES: permission denied`);
		expect(result.error.cause).toBeInstanceOf(Error);
	});

	it("should report createFailed when the starter cannot be written", () => {
		const fs = new MemoryFileSystem().failOn("write", "EROFS: read-only file system");
		const result = loadConfig(CONFIG_PATH, fs);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.kind).toBe("createFailed");
	});

	it("should report readFailed when the file cannot be read", () => {
		const fs = new MemoryFileSystem({ [CONFIG_PATH]: VALID }).failOn("read", "EIO: i/o error");
		const result = loadConfig(CONFIG_PATH, fs);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.kind).toBe("readFailed");
		expect(result.error.message).toBe(`Failed to read config at ${CONFIG_PATH}: EIO: i/o error`);
	});

	it("should report readFailed on invalid UTF-8", () => {
		const fs = new MemoryFileSystem({ [CONFIG_PATH]: new Uint8Array([0x61, 0xff, 0x62]) });
		const result = loadConfig(CONFIG_PATH, fs);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.kind).toBe("readFailed");
		expect(result.error.message).toBe(`Failed to read config at ${CONFIG_PATH}: file is not valid UTF-8.`);
	});

	it("should parse an existing file", () => {
		const fs = new MemoryFileSystem({ [CONFIG_PATH]: VALID });
		const result = loadConfig(CONFIG_PATH, fs);
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.findings).toEqual([]);
		expect(result.value.config?.layout.maxGap).toBe(4);
		expect(result.value.projects.map((p) => p.id)).toEqual(["alpha"]);
	});

	it("should return content problems as findings, not errors", () => {
		const fs = new MemoryFileSystem({ [CONFIG_PATH]: "[layout\n" });
		const result = loadConfig(CONFIG_PATH, fs);
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.hasParseError).toBe(true);
	});
});

describe("loadDefaultConfig", () => {
	it("should load from the resolved default path", () => {
		const fs = new MemoryFileSystem({ "/xdg/workdeck/config.toml": VALID });
		const result = loadDefaultConfig(fs, { XDG_CONFIG_HOME: "/xdg" });
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.projects).toHaveLength(1);
	});
});

describe("loadConfigStrict", () => {
	it("should return the config when there are no failures", () => {
		const fs = new MemoryFileSystem({ "/c.toml": VALID });
		const result = loadConfigStrict("/c.toml", fs);
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.layout.maxGap).toBe(4);
	});

	it("should map a missing file to fileNotFound", () => {
		const result = loadConfigStrict("/c.toml", new MemoryFileSystem());
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.kind).toBe("fileNotFound");
	});

	it("should map createFailed to readFailed", () => {
		const fs = new MemoryFileSystem().failOn("write", "EROFS: read-only file system");
		const result = loadConfigStrict("/c.toml", fs);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.kind).toBe("readFailed");
		if (result.error.kind !== "readFailed") return;
		expect(result.error.cause.kind).toBe("createFailed");
	});

	it("should report a syntax error as parseFailed", () => {
		const fs = new MemoryFileSystem({ "/c.toml": "[layout\n" });
		const result = loadConfigStrict("/c.toml", fs);
		expect(result.ok).toBe(false);
		if (result.ok || result.error.kind !== "parseFailed") throw new Error("expected parseFailed");
		expect(result.error.message).toBe("Config at /c.toml is not valid TOML.");
		expect(result.error.detail.length).toBeGreaterThan(0);
	});

	it("should report FAIL findings as validationFailed", () => {
		const fs = new MemoryFileSystem({ "/c.toml": `${VALID}\n[app]\nautoStartAtLogin = 1\n` });
		const result = loadConfigStrict("/c.toml", fs);
		if (result.ok || result.error.kind !== "validationFailed") throw new Error("expected validationFailed");
		expect(result.error.message).toBe("Config at /c.toml has 1 validation error.");
		expect(result.error.findings.map((f) => f.title)).toEqual(["app.autoStartAtLogin must be a boolean"]);
	});

	it("should not fail on warnings alone", () => {
		const fs = new MemoryFileSystem({ "/c.toml": "" });
		expect(loadConfigStrict("/c.toml", fs).ok).toBe(true);
	});
});
