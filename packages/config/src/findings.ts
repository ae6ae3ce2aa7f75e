import type { Finding, FindingSeverity } from "./types.js";

export interface FindingText {
	detail?: string;
	fix?: string;
}

function finding(severity: FindingSeverity, title: string, text: FindingText): Finding {
	const f: { severity: FindingSeverity; title: string; detail?: string; fix?: string } = { severity, title };
	if (text.detail !== undefined) f.detail = text.detail;
	if (text.fix !== undefined) f.fix = text.fix;
	return Object.freeze(f);
}

export function fail(title: string, text: FindingText = {}): Finding {
	return finding("FAIL", title, text);
}

export function warn(title: string, text: FindingText = {}): Finding {
	return finding("WARN", title, text);
}

export function pass(title: string, text: FindingText = {}): Finding {
	return finding("PASS", title, text);
}

export function hasFailures(findings: readonly Finding[]): boolean {
	return findings.some((f) => f.severity === "FAIL");
}

/** Findings of the given severity, in their original order. */
export function findingsOf(findings: readonly Finding[], severity: FindingSeverity): Finding[] {
	return findings.filter((f) => f.severity === severity);
}
