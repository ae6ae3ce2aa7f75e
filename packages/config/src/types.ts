/**
 * @workdeck/config: Typed configuration model.
 *
 * Every record here is built once per load, frozen, and never mutated.
 * A reload produces a new {@link Config}.
 */

// ─── Findings ────────────────────────────────────────────────────────────────

export type FindingSeverity = "PASS" | "WARN" | "FAIL";

/** One content-level diagnostic about the config file. */
export interface Finding {
	readonly severity: FindingSeverity;
	readonly title: string;
	readonly detail?: string;
	/** Remediation hint shown as "Fix: ..." */
	readonly fix?: string;
}

// ─── Sections ────────────────────────────────────────────────────────────────

/** `[app]` */
export interface AppConfig {
	readonly autoStartAtLogin: boolean;
}

/** `[agentLayer]` */
export interface AgentLayerConfig {
	/** Default for `useAgentLayer` on projects that do not set it. */
	readonly enabled: boolean;
}

/** `[chrome]` */
export interface ChromeConfig {
	/** URLs always opened as leftmost tabs in every fresh browser window. */
	readonly pinnedTabs: readonly string[];
	/** URLs opened when a project has no tab history. */
	readonly defaultTabs: readonly string[];
	/** Detect the project's git remote URL and keep it open as a tab. */
	readonly openGitRemote: boolean;
}

export type IdePosition = "left" | "right";
export type Justification = "left" | "right";

/** `[layout]`: window positioning. */
export interface LayoutConfig {
	/** Physical screen width in inches below which small-screen mode is used. */
	readonly smallScreenThreshold: number;
	/** Window height as a percentage of screen height (1-100). */
	readonly windowHeight: number;
	/** Maximum window width in inches. */
	readonly maxWindowWidth: number;
	readonly idePosition: IdePosition;
	/** Screen edge the window pair is anchored to. */
	readonly justification: Justification;
	/** Maximum gap between windows as a percentage of screen width (0-100). */
	readonly maxGap: number;
}

// ─── Projects ────────────────────────────────────────────────────────────────

/** One `[[project]]` entry. */
export interface ProjectConfig {
	/** Normalized from `name`; unique within a config. */
	readonly id: string;
	readonly name: string;
	/**
	 * Remote authority (`ssh-remote+user@host`). When set, `path` is an
	 * absolute path on the remote machine.
	 */
	readonly remote?: string;
	readonly path: string;
	/** `#RRGGBB` as written, or a lowercase palette name. */
	readonly color: string;
	readonly useAgentLayer: boolean;
	readonly chromePinnedTabs: readonly string[];
	readonly chromeDefaultTabs: readonly string[];
}

export type RemoteProjectConfig = ProjectConfig & { readonly remote: string };

export function isRemoteProject(project: ProjectConfig): project is RemoteProjectConfig {
	return project.remote !== undefined;
}

// ─── Root ────────────────────────────────────────────────────────────────────

export interface Config {
	readonly app: AppConfig;
	readonly agentLayer: AgentLayerConfig;
	readonly chrome: ChromeConfig;
	readonly layout: LayoutConfig;
	/** In declaration order. */
	readonly projects: readonly ProjectConfig[];
}

export interface ConfigLoadResult {
	/** Undefined exactly when the document failed TOML syntax parsing. */
	readonly config?: Config;
	readonly findings: readonly Finding[];
	/** Valid projects, available even when `config` is undefined. */
	readonly projects: readonly ProjectConfig[];
	readonly hasParseError: boolean;
}

// ─── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_APP_CONFIG: AppConfig = Object.freeze({ autoStartAtLogin: false });

export const DEFAULT_AGENT_LAYER_CONFIG: AgentLayerConfig = Object.freeze({ enabled: false });

export const DEFAULT_CHROME_CONFIG: ChromeConfig = Object.freeze({
	pinnedTabs: Object.freeze([]),
	defaultTabs: Object.freeze([]),
	openGitRemote: false,
});

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = Object.freeze({
	smallScreenThreshold: 24,
	windowHeight: 90,
	maxWindowWidth: 18,
	idePosition: "left",
	justification: "right",
	maxGap: 10,
});
