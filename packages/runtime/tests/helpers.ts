import type {
	ChatStreamInput,
	ModelEvent,
	StreamingChatModel,
} from "@tollgate/core";
import type {
	ExchangeEvent,
	ToolInvocationRecord,
} from "@tollgate/shared-types";

export type ScriptedTurn =
	| ModelEvent[]
	| ((input: ChatStreamInput) => AsyncIterable<ModelEvent>);

/** Plays back one scripted turn per call; the last turn repeats. */
export class ScriptedModel implements StreamingChatModel<string> {
	readonly provider = "scripted";
	readonly model = "scripted-model";
	readonly inputs: ChatStreamInput[] = [];
	private readonly turns: ScriptedTurn[];

	constructor(turns: ScriptedTurn[]) {
		this.turns = turns;
	}

	async *stream(input: ChatStreamInput): AsyncGenerator<ModelEvent> {
		const turn = this.turns[Math.min(this.inputs.length, this.turns.length - 1)];
		this.inputs.push({ ...input, messages: [...input.messages] });
		if (typeof turn === "function") {
			yield* turn(input);
			return;
		}
		yield* turn;
	}
}

export const toolCall = (
	id: string,
	name: string,
	args: Record<string, unknown>,
): ModelEvent => ({
	type: "tool_call",
	call: { id, type: "function", function: { name, arguments: JSON.stringify(args) } },
});

export const callTurn = (...calls: ModelEvent[]): ModelEvent[] => [
	...calls,
	{ type: "tool_results_needed" },
	{ type: "turn_complete", stop_reason: "tool_calls" },
];

export const reply = (text: string): ModelEvent[] => [
	{ type: "text_delta", delta: text },
	{ type: "turn_complete", stop_reason: "stop" },
];

export const waitForAbort = (signal?: AbortSignal): Promise<void> =>
	new Promise((resolve) => {
		if (!signal || signal.aborted) {
			resolve();
			return;
		}
		signal.addEventListener("abort", () => resolve(), { once: true });
	});

export const collect = async (
	stream: AsyncIterable<ExchangeEvent>,
	onEvent: (event: ExchangeEvent) => void = () => {},
): Promise<ExchangeEvent[]> => {
	const events: ExchangeEvent[] = [];
	for await (const event of stream) {
		events.push(event);
		onEvent(event);
	}
	return events;
};

export const invocationsOf = (events: ExchangeEvent[]): ToolInvocationRecord[] =>
	events.flatMap((event) =>
		event.type === "tool_invocation_completed" ? [event.invocation] : [],
	);
