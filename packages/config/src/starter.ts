import { PROJECT_COLOR_NAMES } from "./palette.js";

/**
 * Written to the config path when no file exists. Every line is a comment,
 * so the starter parses to the all-defaults config with no projects.
 */
export const STARTER_CONFIG = `# workdeck configuration
#
# [app] (optional): application settings
# - autoStartAtLogin: launch workdeck when you log in (default: false)
#
# [agentLayer] (optional): global Agent Layer settings
# - enabled: default useAgentLayer value for all projects (default: false)
#
# [chrome] (optional): global browser tab settings
# - pinnedTabs: URLs always opened as leftmost tabs in every fresh browser window
# - defaultTabs: URLs opened when no tab history exists for a project
# - openGitRemote: detect the git remote URL and keep it open as a tab (default: false)
#
# [layout] (optional): window positioning
# - smallScreenThreshold: physical screen width in inches below which small-screen mode is used (default: 24)
# - windowHeight: window height as % of screen height, 1-100 (default: 90)
# - maxWindowWidth: max window width in inches (default: 18)
# - idePosition: IDE window side, "left" or "right" (default: "left")
# - justification: screen edge the windows align to, "left" or "right" (default: "right")
# - maxGap: max gap between windows as % of screen width, 0-100 (default: 10)
#
# Each [[project]] entry describes one git repo (local or SSH remote).
# - name: display name (the id is derived by lowercasing and replacing runs of non [a-z0-9] with '-')
# - remote: (optional) SSH remote authority, e.g. ssh-remote+user@host
# - path: absolute path to the repo (on the remote machine when remote is set)
# - color: "#RRGGBB" or a named color (${PROJECT_COLOR_NAMES.join(", ")})
# - useAgentLayer: (optional) override agentLayer.enabled for this project
# - chromePinnedTabs: (optional) per-project URLs always opened as leftmost tabs
# - chromeDefaultTabs: (optional) per-project URLs opened when no tab history exists
#
# Example:
#
# [app]
# autoStartAtLogin = true
#
# [agentLayer]
# enabled = true
#
# [chrome]
# pinnedTabs = ["https://dashboard.example.com"]
# defaultTabs = ["https://docs.example.com"]
# openGitRemote = true
#
# [layout]
# smallScreenThreshold = 24
# windowHeight = 90
# maxWindowWidth = 18
# idePosition = "left"
# justification = "right"
# maxGap = 10
#
# [[project]]
# name = "Workdeck"
# path = "/home/you/src/workdeck"
# color = "indigo"
# useAgentLayer = false
# chromePinnedTabs = ["https://api.example.com"]
# chromeDefaultTabs = ["https://tracker.example.com"]
#
# [[project]]
# name = "Remote ML"
# remote = "ssh-remote+you@build-box.local"
# path = "/home/you/src/local-ml"
# color = "teal"
# useAgentLayer = false
`;
