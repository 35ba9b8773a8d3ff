import type { ToolCall } from "./tools";

export type ChatStreamUsage = {
	input_tokens: number;
	output_tokens: number;
	reasoning_tokens: number;
	cache_tokens: number;
};

/**
 * One event of a streamed model turn. `tool_call` carries a fully assembled
 * call; argument deltas are stitched together by the provider adapter.
 */
export type ModelEvent =
	| { type: "text_delta"; delta: string }
	| { type: "tool_call"; call: ToolCall }
	| { type: "tool_results_needed" }
	| { type: "usage"; usage: ChatStreamUsage }
	| { type: "turn_complete"; stop_reason: string | null }
	| { type: "error"; error: Error };
