export type JsonValue =
	| string
	| number
	| boolean
	| null
	| { [key: string]: JsonValue }
	| JsonValue[];

export type TokenUsage = {
	input_tokens: number;
	output_tokens: number;
	reasoning_tokens: number;
	cache_tokens: number;
};

export const emptyTokenUsage = (): TokenUsage => ({
	input_tokens: 0,
	output_tokens: 0,
	reasoning_tokens: 0,
	cache_tokens: 0,
});

export const addTokenUsage = (
	left: TokenUsage,
	right: TokenUsage,
): TokenUsage => ({
	input_tokens: left.input_tokens + right.input_tokens,
	output_tokens: left.output_tokens + right.output_tokens,
	reasoning_tokens: left.reasoning_tokens + right.reasoning_tokens,
	cache_tokens: left.cache_tokens + right.cache_tokens,
});

export type SessionRecord = TokenUsage & {
	id: string;
	title: string | null;
	model_id: string | null;
	created_at: string;
	updated_at: string;
	total_tokens: number;
};

export type MessageRole = "user" | "assistant";

export type ToolInvocationStatus =
	| "completed"
	| "failed"
	| "blocked"
	| "denied"
	| "rejected"
	| "superseded";

export type ToolInvocationError = {
	kind: string;
	message: string;
};

export type ToolInvocationRecord = {
	tool_call_id: string;
	tool_name: string;
	arguments: JsonValue;
	status: ToolInvocationStatus;
	result: string | null;
	error: ToolInvocationError | null;
};

export type SourceRecord = {
	id: number;
	title: string;
	content_hash: string;
	size: number;
};

export type MessageRecord = {
	id: number;
	session_id: string;
	ordinal: number;
	role: MessageRole;
	content: string;
	reasoning: string | null;
	tool_invocations: ToolInvocationRecord[];
	sources: SourceRecord[];
	created_at: string;
};

export type SessionSnapshot = {
	session: SessionRecord;
	messages: MessageRecord[];
};

export type Attachment = {
	filename: string;
	content: string;
};
