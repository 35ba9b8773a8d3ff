import type { JsonValue, SourceRecord, TokenUsage, ToolInvocationRecord } from "./session";

export type ExchangeStartedEvent = {
	type: "exchange";
	exchange_id: string;
};

export type SessionEvent = {
	type: "session";
	session_id: string;
	created: boolean;
};

export type SourcesEvent = {
	type: "sources";
	sources: SourceRecord[];
};

export type ContentDeltaEvent = {
	type: "content";
	delta: string;
};

export type ReasoningDeltaEvent = {
	type: "reasoning";
	delta: string;
};

export type ToolApprovalRequestEvent = {
	type: "tool_approval_request";
	ticket_id: string;
	tool_call_id: string;
	tool: string;
	args: JsonValue;
	description: string;
	scope: string | null;
};

export type ToolInvocationCompletedEvent = {
	type: "tool_invocation_completed";
	invocation: ToolInvocationRecord;
};

export type UsageEvent = {
	type: "usage";
	usage: TokenUsage;
};

export type DoneStatus = "completed" | "cancelled" | "max_iterations";

export type DoneEvent = {
	type: "done";
	status: DoneStatus;
	message_id: number | null;
};

export type ExchangeErrorKind = "transport" | "storage" | "internal";

export type ErrorEvent = {
	type: "error";
	kind: ExchangeErrorKind;
	message: string;
	message_id: number | null;
};

export type ExchangeEvent =
	| ExchangeStartedEvent
	| SessionEvent
	| SourcesEvent
	| ContentDeltaEvent
	| ReasoningDeltaEvent
	| ToolApprovalRequestEvent
	| ToolInvocationCompletedEvent
	| UsageEvent
	| DoneEvent
	| ErrorEvent;

export const isTerminalEvent = (
	event: ExchangeEvent,
): event is DoneEvent | ErrorEvent =>
	event.type === "done" || event.type === "error";
