import { formatRuleSubject, type PermissionRule } from "@tollgate/config";
import { appendPermissionRules } from "@tollgate/config-loader";
import { log } from "@tollgate/logger";
import type {
	ApprovalDecision,
	ApprovalTicketView,
	PersistScope,
} from "@tollgate/shared-types";
import type { PermissionPolicy } from "../permissions/service";
import type { ApprovalCoordinator } from "./coordinator";

export type ResolveApprovalDeps = {
	coordinator: ApprovalCoordinator;
	policy: PermissionPolicy;
	/** Project config receiving persisted rules; omitted keeps them in memory. */
	configPath?: string;
};

export type ResolveApprovalInput = {
	ticketId: string;
	decision: ApprovalDecision;
	persist?: PersistScope;
};

export type ResolveApprovalResult =
	| { ok: true; ticket: ApprovalTicketView; remembered: string[] }
	| {
			ok: false;
			error: "not_found" | "already_resolved";
			ticket?: ApprovalTicketView;
	  };

/**
 * External entry point for a human decision. Resolution only settles the
 * ticket; the waiting exchange performs any execution.
 */
export const resolveApproval = async (
	deps: ResolveApprovalDeps,
	input: ResolveApprovalInput,
): Promise<ResolveApprovalResult> => {
	const result = deps.coordinator.resolve(
		input.ticketId,
		input.decision,
		input.persist,
	);
	if (!result.ok) return result;
	if (!result.persist) {
		return { ok: true, ticket: result.ticket, remembered: [] };
	}
	const effect = input.decision === "approve" ? "allow" : "deny";
	const rules: PermissionRule[] = deps.policy.remember(
		effect,
		result.ticket.tool,
		result.rawArgs,
		result.persist,
	);
	if (deps.configPath && rules.length) {
		await appendPermissionRules(deps.configPath, effect, rules);
		log(
			`persisted ${effect} rules ${rules.map(formatRuleSubject).join(", ")} to ${deps.configPath}`,
		);
	}
	return {
		ok: true,
		ticket: result.ticket,
		remembered: rules.map(formatRuleSubject),
	};
};
