/**
 * @workdeck/ui: Doctor report rendering.
 *
 * A report is a header plus a list of findings. Rendering sorts the findings
 * by severity (FAIL, WARN, PASS), keeping their original order within a
 * severity, and closes with a per-severity summary.
 */

import type { ConfigError, Result } from "@workdeck/core";
import { pass, fail } from "@workdeck/config";
import type { ConfigLoadResult, Finding, FindingSeverity } from "@workdeck/config";
import { bold, dim, green, red, yellow } from "./ansi.js";

export interface DoctorReport {
	readonly timestamp: string;
	readonly version: string;
	readonly configPath: string;
	readonly findings: readonly Finding[];
}

export interface RenderOptions {
	/** Emit ANSI colors. Default: false. */
	colors?: boolean;
}

export interface FindingCounts {
	pass: number;
	warn: number;
	fail: number;
}

const SEVERITY_ORDER: Record<FindingSeverity, number> = { FAIL: 0, WARN: 1, PASS: 2 };

const SEVERITY_COLOR: Record<FindingSeverity, (s: string) => string> = {
	FAIL: red,
	WARN: yellow,
	PASS: green,
};

/** Stable sort: FAIL, then WARN, then PASS. */
export function sortFindings(findings: readonly Finding[]): Finding[] {
	return findings
		.map((finding, index) => ({ finding, index }))
		.sort((a, b) => SEVERITY_ORDER[a.finding.severity] - SEVERITY_ORDER[b.finding.severity] || a.index - b.index)
		.map(({ finding }) => finding);
}

export function countFindings(findings: readonly Finding[]): FindingCounts {
	const counts: FindingCounts = { pass: 0, warn: 0, fail: 0 };
	for (const f of findings) {
		if (f.severity === "PASS") counts.pass++;
		else if (f.severity === "WARN") counts.warn++;
		else counts.fail++;
	}
	return counts;
}

export function renderReport(report: DoctorReport, options: RenderOptions = {}): string {
	const colors = options.colors ?? false;
	const paint = (style: (s: string) => string, s: string) => (colors ? style(s) : s);

	const lines: string[] = [
		paint(bold, "workdeck doctor report"),
		paint(dim, `Timestamp: ${report.timestamp}`),
		paint(dim, `workdeck version: ${report.version}`),
		paint(dim, `Config: ${report.configPath}`),
		"",
	];

	const sorted = sortFindings(report.findings);
	if (sorted.length === 0) {
		lines.push(`${paint(green, "PASS")}  no issues found`);
	}
	for (const finding of sorted) {
		lines.push(`${paint(SEVERITY_COLOR[finding.severity], finding.severity)}  ${paint(bold, finding.title)}`);
		if (finding.detail !== undefined) lines.push(paint(dim, `  Detail: ${finding.detail}`));
		if (finding.fix !== undefined) lines.push(`  Fix: ${finding.fix}`);
	}

	const counts = countFindings(sorted);
	lines.push("", `Summary: ${counts.pass} PASS, ${counts.warn} WARN, ${counts.fail} FAIL`);
	return lines.join("\n");
}

/** Findings for the config portion of a doctor run. */
export function configFindings(outcome: Result<ConfigLoadResult, ConfigError>): Finding[] {
	if (!outcome.ok) {
		return [fail("Config file error", { detail: outcome.error.message })];
	}

	const result = outcome.value;
	const findings: Finding[] = [];
	if (!result.findings.some((f) => f.severity === "FAIL")) {
		findings.push(pass("Config file parsed successfully"));
	}
	findings.push(...result.findings);

	const n = result.projects.length;
	if (n > 0) {
		findings.push(pass(`${n} ${n === 1 ? "project" : "projects"} configured`));
	}
	return findings;
}

export function configFindingsReport(
	outcome: Result<ConfigLoadResult, ConfigError>,
	meta: Omit<DoctorReport, "findings">,
): DoctorReport {
	return { ...meta, findings: configFindings(outcome) };
}
