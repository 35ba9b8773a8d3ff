import OpenAI, { type ClientOptions } from "openai";
import type { ChatCompletionChunk } from "openai/resources/chat/completions";
import { debugLog } from "@tollgate/logger";
import type { ModelEvent, ToolCall } from "../../types/llm";
import { isAbortError } from "../../utils/abort";
import type { ChatStreamInput, StreamingChatModel } from "../base";
import { ModelTransportError } from "../errors";
import {
	toChatCompletionMessages,
	toChatCompletionTools,
	toStreamUsage,
} from "./serializer";

const PROVIDER_NAME = "openai" as const;
const DEFAULT_MODEL = "local-model";

export type ChatOpenAIOptions = {
	client?: OpenAI;
	clientOptions?: ClientOptions;
	model?: string;
};

type PendingToolCall = {
	id: string;
	name: string;
	arguments: string;
};

const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Streaming adapter for OpenAI-compatible chat completion endpoints (OpenAI,
 * LM Studio, Ollama, vLLM). Tool-call argument fragments are assembled by
 * their stream index and surfaced once the turn ends.
 */
export class ChatOpenAI implements StreamingChatModel<typeof PROVIDER_NAME> {
	readonly provider: typeof PROVIDER_NAME = PROVIDER_NAME;
	readonly model: string;
	private readonly client: OpenAI;

	constructor(options: ChatOpenAIOptions = {}) {
		this.client = options.client ?? new OpenAI(options.clientOptions);
		this.model = options.model ?? DEFAULT_MODEL;
	}

	async *stream(input: ChatStreamInput): AsyncGenerator<ModelEvent> {
		const model = input.model ?? this.model;
		const tools = toChatCompletionTools(input.tools);
		debugLog(
			`openai stream model=${model} messages=${input.messages.length} tools=${tools?.length ?? 0}`,
		);
		let stream: AsyncIterable<ChatCompletionChunk>;
		try {
			stream = await this.client.chat.completions.create(
				{
					model,
					messages: toChatCompletionMessages(input.messages),
					...(tools ? { tools } : {}),
					stream: true,
					stream_options: { include_usage: true },
				},
				input.signal ? { signal: input.signal } : undefined,
			);
		} catch (error) {
			if (isAbortError(error)) throw error;
			yield {
				type: "error",
				error: new ModelTransportError(
					PROVIDER_NAME,
					`request failed: ${describeError(error)}`,
					{ cause: error },
				),
			};
			return;
		}

		const pending = new Map<number, PendingToolCall>();
		let stopReason: string | null = null;
		try {
			for await (const chunk of stream) {
				if (chunk.usage) {
					yield { type: "usage", usage: toStreamUsage(chunk.usage) };
				}
				for (const choice of chunk.choices) {
					const delta = choice.delta;
					if (delta.content) {
						yield { type: "text_delta", delta: delta.content };
					}
					for (const fragment of delta.tool_calls ?? []) {
						const current = pending.get(fragment.index) ?? {
							id: "",
							name: "",
							arguments: "",
						};
						if (fragment.id) current.id = fragment.id;
						if (fragment.function?.name) {
							current.name += fragment.function.name;
						}
						if (fragment.function?.arguments) {
							current.arguments += fragment.function.arguments;
						}
						pending.set(fragment.index, current);
					}
					if (choice.finish_reason) {
						stopReason = choice.finish_reason;
					}
				}
			}
		} catch (error) {
			if (isAbortError(error)) throw error;
			yield {
				type: "error",
				error: new ModelTransportError(
					PROVIDER_NAME,
					`stream interrupted: ${describeError(error)}`,
					{ cause: error },
				),
			};
			return;
		}

		const calls: ToolCall[] = [...pending.entries()]
			.sort(([left], [right]) => left - right)
			.map(([index, call]) => ({
				id: call.id || `call_${index}`,
				type: "function",
				function: { name: call.name, arguments: call.arguments || "{}" },
			}));
		for (const call of calls) {
			yield { type: "tool_call", call };
		}
		if (calls.length > 0) {
			yield { type: "tool_results_needed" };
		}
		yield { type: "turn_complete", stop_reason: stopReason };
	}
}
