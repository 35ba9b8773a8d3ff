import type {
	ChatCompletionMessageParam,
	ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { CompletionUsage } from "openai/resources/completions";
import type {
	BaseMessage,
	ChatStreamUsage,
	ToolDefinition,
} from "../../types/llm";

export const toChatCompletionMessages = (
	messages: BaseMessage[],
): ChatCompletionMessageParam[] =>
	messages.map((message): ChatCompletionMessageParam => {
		switch (message.role) {
			case "system":
				return { role: "system", content: message.content };
			case "user":
				return { role: "user", content: message.content };
			case "tool":
				return {
					role: "tool",
					tool_call_id: message.tool_call_id,
					content: message.content,
				};
			case "assistant":
				return {
					role: "assistant",
					content: message.content,
					...(message.tool_calls?.length
						? {
								tool_calls: message.tool_calls.map((call) => ({
									id: call.id,
									type: "function" as const,
									function: {
										name: call.function.name,
										arguments: call.function.arguments,
									},
								})),
							}
						: {}),
				};
		}
	});

export const toChatCompletionTools = (
	tools?: ToolDefinition[] | null,
): ChatCompletionTool[] | undefined => {
	if (!tools?.length) return undefined;
	return tools.map((tool) => ({
		type: "function" as const,
		function: {
			name: tool.name,
			description: tool.description,
			// spread into a plain object type to satisfy FunctionParameters
			parameters: { ...tool.parameters },
			...(tool.strict !== undefined ? { strict: tool.strict } : {}),
		},
	}));
};

export const toStreamUsage = (usage: CompletionUsage): ChatStreamUsage => ({
	input_tokens: usage.prompt_tokens,
	output_tokens: usage.completion_tokens,
	reasoning_tokens: usage.completion_tokens_details?.reasoning_tokens ?? 0,
	cache_tokens: usage.prompt_tokens_details?.cached_tokens ?? 0,
});
