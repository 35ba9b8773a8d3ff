import type { ToolCall } from "./tools";

export type UserMessage = {
	role: "user";
	content: string;
};

export type SystemMessage = {
	role: "system";
	content: string;
};

export type AssistantMessage = {
	role: "assistant";
	content: string | null;
	tool_calls?: ToolCall[];
};

export type ToolMessage = {
	role: "tool";
	tool_call_id: string;
	tool_name: string;
	content: string;
	is_error?: boolean;
};

export type BaseMessage =
	| UserMessage
	| SystemMessage
	| AssistantMessage
	| ToolMessage;
