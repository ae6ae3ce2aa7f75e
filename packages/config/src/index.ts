// @workdeck/config: config.toml loading and validation
export * from "./types.js";
export { fail, warn, pass, hasFailures, findingsOf } from "./findings.js";
export type { FindingText } from "./findings.js";
export { parseDocument, toDocValue, docTable } from "./document.js";
export type { DocTable, DocValue } from "./document.js";
export {
	readRequiredString,
	readOptionalString,
	readOptionalBool,
	readOptionalNumber,
	readOptionalInteger,
	readOptionalStringArray,
	validateUrls,
} from "./readers.js";
export { normalizeId, isValidId, isReservedId, RESERVED_IDS } from "./identifier.js";
export {
	parseRemoteAuthority,
	extractRemoteTarget,
	shellEscape,
	REMOTE_AUTHORITY_PREFIX,
	REMOTE_AUTHORITY_MESSAGES,
} from "./remote.js";
export type { RemoteAuthorityError } from "./remote.js";
export {
	PROJECT_COLOR_NAMES,
	isValidHexColor,
	isNamedColor,
	resolveProjectColor,
	projectColorHex,
} from "./palette.js";
export type { ProjectColorRGB } from "./palette.js";

// Parsing
export {
	KNOWN_TOP_LEVEL_KEYS,
	KNOWN_APP_KEYS,
	KNOWN_AGENT_LAYER_KEYS,
	KNOWN_CHROME_KEYS,
	KNOWN_LAYOUT_KEYS,
	checkUnknownKeys,
	parseAppSection,
	parseAgentLayerSection,
	parseChromeSection,
	parseLayoutSection,
} from "./sections.js";
export { KNOWN_PROJECT_KEYS, parseProjects, parseProject } from "./projects.js";
export { parseConfig, PARSE_ERROR_TITLE } from "./parser.js";

// Loading and writing
export { STARTER_CONFIG } from "./starter.js";
export { loadConfig, loadDefaultConfig, loadConfigStrict, defaultConfigPath } from "./loader.js";
export type { ConfigLoadError, Environment } from "./loader.js";
export { serializeConfig } from "./serialize.js";
export { updateAutoStartAtLogin, setAutoStartAtLogin } from "./write-back.js";
