import {
	formatRuleSubject,
	type PermissionEffect,
	type PermissionRule,
	type PermissionsConfig,
} from "@tollgate/config";
import { debugLog } from "@tollgate/logger";
import type { PersistScope } from "@tollgate/shared-types";
import {
	extractCommand,
	isSameRule,
	matchBashRule,
	matchFullCommandRule,
	matchPathRule,
	matchToolRule,
	normalizeCommand,
	parseRawArgsObject,
	pathArgument,
	ruleHasScope,
	splitCommandSegments,
} from "./rules";
import { deriveRememberCommand } from "./scope";

export type PolicyDecision = {
	decision: "allow" | "deny" | "ask";
	reason?: string;
	subject?: string;
};

export type PolicySnapshot = Readonly<{
	version: number;
	allow: readonly PermissionRule[];
	deny: readonly PermissionRule[];
}>;

type SegmentVerdict =
	| { decision: "allow" }
	| { decision: "deny"; subject: string }
	| { decision: "ask"; segment: string };

const deniedByPolicy = (subject: string): PolicyDecision => ({
	decision: "deny",
	reason: `denied by policy (${subject})`,
	subject,
});

const freezeRules = (
	rules: readonly PermissionRule[],
): readonly PermissionRule[] =>
	Object.freeze(rules.map((rule) => Object.freeze({ ...rule })));

const dedupeRules = (rules: readonly PermissionRule[]): PermissionRule[] => {
	const unique: PermissionRule[] = [];
	for (const rule of rules) {
		if (unique.some((existing) => isSameRule(existing, rule))) continue;
		unique.push(rule);
	}
	return unique;
};

const buildSnapshot = (
	version: number,
	allow: readonly PermissionRule[],
	deny: readonly PermissionRule[],
): PolicySnapshot =>
	Object.freeze({
		version,
		allow: freezeRules(allow),
		deny: freezeRules(deny),
	});

/**
 * Allow/deny rule store. Every update builds a new frozen snapshot and swaps
 * it in, so a decision always reads one complete rule set.
 */
export class PermissionPolicy {
	private snapshot: PolicySnapshot;

	constructor(config?: PermissionsConfig) {
		this.snapshot = buildSnapshot(
			1,
			dedupeRules(config?.allow ?? []),
			dedupeRules(config?.deny ?? []),
		);
	}

	current(): PolicySnapshot {
		return this.snapshot;
	}

	decide(toolName: string, rawArgs: string): PolicyDecision {
		const snapshot = this.snapshot;
		const decision =
			toolName === "bash"
				? this.decideBash(snapshot, rawArgs)
				: this.decideTool(snapshot, toolName, rawArgs);
		debugLog(
			`policy ${toolName} -> ${decision.decision}${decision.reason ? ` (${decision.reason})` : ""} v${snapshot.version}`,
		);
		return decision;
	}

	replaceRules(config: PermissionsConfig): void {
		this.snapshot = buildSnapshot(
			this.snapshot.version + 1,
			dedupeRules(config.allow ?? []),
			dedupeRules(config.deny ?? []),
		);
	}

	/**
	 * Adds the rules a persisted decision implies and returns the ones that
	 * were not present yet.
	 */
	remember(
		effect: PermissionEffect,
		toolName: string,
		rawArgs: string,
		persist: PersistScope,
	): PermissionRule[] {
		const snapshot = this.snapshot;
		const existing = effect === "allow" ? snapshot.allow : snapshot.deny;
		const added = this.buildRules(toolName, rawArgs, persist).filter(
			(rule) => !existing.some((entry) => isSameRule(entry, rule)),
		);
		if (!added.length) return [];
		const allow =
			effect === "allow" ? [...snapshot.allow, ...added] : snapshot.allow;
		const deny = effect === "deny" ? [...snapshot.deny, ...added] : snapshot.deny;
		this.snapshot = buildSnapshot(snapshot.version + 1, allow, deny);
		debugLog(
			`policy remember ${effect} ${added.map(formatRuleSubject).join(", ")}`,
		);
		return added;
	}

	describeRememberedRules(
		toolName: string,
		rawArgs: string,
		persist: PersistScope,
	): string[] {
		return this.buildRules(toolName, rawArgs, persist).map(formatRuleSubject);
	}

	/** Human-readable summary of a call, shown on its approval ticket. */
	describeCall(toolName: string, rawArgs: string): string {
		const parsed = parseRawArgsObject(rawArgs);
		const pick = (key: string): string | null => {
			const value = parsed?.[key];
			return typeof value === "string" && value.trim() ? value.trim() : null;
		};
		switch (toolName) {
			case "bash":
				return `Run command: ${pick("command") ?? rawArgs}`;
			case "write": {
				const content = pick("content") ?? "";
				return `Write ${pick("path") ?? "(unknown path)"} (${Buffer.byteLength(content, "utf8")} bytes)`;
			}
			case "read":
				return `Read ${pick("path") ?? "(unknown path)"}`;
			case "grep":
				return `Search for ${pick("pattern") ?? "(no pattern)"} in ${pick("path") ?? "."}`;
			case "now":
				return `Get the current date and time (${pick("timezone") ?? "local"})`;
			default:
				return `Run tool ${toolName}`;
		}
	}

	private decideTool(
		snapshot: PolicySnapshot,
		toolName: string,
		rawArgs: string,
	): PolicyDecision {
		const target = pathArgument(toolName, parseRawArgsObject(rawArgs));
		if (target !== undefined) {
			const scoped = (rule: PermissionRule): boolean =>
				matchPathRule(rule, toolName, target);
			const scopedDeny = snapshot.deny.find(scoped);
			if (scopedDeny) return deniedByPolicy(formatRuleSubject(scopedDeny));
			const scopedAllow = snapshot.allow.find(scoped);
			if (scopedAllow) {
				return { decision: "allow", subject: formatRuleSubject(scopedAllow) };
			}
		}
		if (snapshot.deny.some((rule) => matchToolRule(rule, toolName))) {
			return deniedByPolicy(toolName);
		}
		if (snapshot.allow.some((rule) => matchToolRule(rule, toolName))) {
			return { decision: "allow", subject: toolName };
		}
		return { decision: "ask", subject: toolName };
	}

	private decideBash(snapshot: PolicySnapshot, rawArgs: string): PolicyDecision {
		const command = extractCommand(rawArgs);
		if (!command) {
			return { decision: "ask", reason: "missing command" };
		}
		const normalized = normalizeCommand(command);
		if (!normalized) {
			return { decision: "ask", reason: "empty command" };
		}
		const fullDeny = snapshot.deny.find((rule) =>
			matchFullCommandRule(rule, normalized),
		);
		if (fullDeny) return deniedByPolicy(formatRuleSubject(fullDeny));

		const segments = splitCommandSegments(normalized);
		if (!segments.length) {
			return { decision: "ask", reason: "empty command" };
		}
		const verdicts = segments.map((segment) =>
			this.decideSegment(snapshot, segment),
		);
		for (const verdict of verdicts) {
			if (verdict.decision === "deny") return deniedByPolicy(verdict.subject);
		}
		const pending = verdicts.find((verdict) => verdict.decision === "ask");
		if (pending && pending.decision === "ask") {
			return {
				decision: "ask",
				reason: `segment requires confirmation (${pending.segment})`,
			};
		}
		return { decision: "allow" };
	}

	private decideSegment(
		snapshot: PolicySnapshot,
		segment: string,
	): SegmentVerdict {
		const scoped = (rule: PermissionRule): boolean =>
			ruleHasScope(rule) && matchBashRule(rule, segment);
		const scopedDeny = snapshot.deny.find(scoped);
		if (scopedDeny) {
			return { decision: "deny", subject: formatRuleSubject(scopedDeny) };
		}
		if (snapshot.allow.some(scoped)) return { decision: "allow" };
		if (snapshot.deny.some((rule) => matchToolRule(rule, "bash"))) {
			return { decision: "deny", subject: "bash" };
		}
		if (snapshot.allow.some((rule) => matchToolRule(rule, "bash"))) {
			return { decision: "allow" };
		}
		return { decision: "ask", segment };
	}

	private buildRules(
		toolName: string,
		rawArgs: string,
		persist: PersistScope,
	): PermissionRule[] {
		if (persist === "tool" || toolName !== "bash") {
			return [{ tool: toolName }];
		}
		const command = extractCommand(rawArgs);
		if (!command) return [];
		const rules: PermissionRule[] = [];
		for (const segment of splitCommandSegments(normalizeCommand(command))) {
			const rememberCommand = deriveRememberCommand(segment);
			if (!rememberCommand) continue;
			const rule: PermissionRule = { tool: "bash", command: rememberCommand };
			if (rules.some((existing) => isSameRule(existing, rule))) continue;
			rules.push(rule);
		}
		return rules;
	}
}
