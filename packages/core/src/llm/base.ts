import type { BaseMessage, ModelEvent, ToolDefinition } from "../types/llm";

export type ProviderName = "openai";

export type ChatStreamInput = {
	messages: BaseMessage[];
	model?: string;
	tools?: ToolDefinition[] | null;
	signal?: AbortSignal;
};

export interface StreamingChatModel<P extends string = ProviderName> {
	readonly provider: P;
	readonly model: string;

	stream(input: ChatStreamInput): AsyncIterable<ModelEvent>;
}
