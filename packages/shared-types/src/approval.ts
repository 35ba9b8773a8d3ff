import type { JsonValue } from "./session";

export type ApprovalDecision = "approve" | "reject";

/**
 * "tool" remembers the bare tool name, "scope" remembers the narrower
 * command family (for example `bash:git push`).
 */
export type PersistScope = "tool" | "scope";

export type TicketState = "pending" | "approved" | "rejected" | "superseded";

export type ApprovalTicketView = {
	id: string;
	exchange_id: string;
	tool_call_id: string;
	tool: string;
	arguments: JsonValue;
	description: string;
	scope: string | null;
	state: TicketState;
	reason: string | null;
	created_at: string;
	resolved_at: string | null;
};

export const parseApprovalDecision = (
	value: unknown,
): ApprovalDecision | undefined => {
	if (value === "approve" || value === "reject") {
		return value;
	}
	return undefined;
};

export const parsePersistScope = (value: unknown): PersistScope | undefined => {
	if (value === "tool" || value === "scope") {
		return value;
	}
	return undefined;
};
