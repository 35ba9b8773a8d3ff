import { isJsonValue, type ToolResult } from "@tollgate/core";
import type {
	JsonValue,
	ToolInvocationRecord,
	ToolInvocationStatus,
} from "@tollgate/shared-types";

/** Parsed tool arguments; text that is not JSON is kept verbatim. */
export const parseArgumentsValue = (rawArgs: string): JsonValue => {
	try {
		const parsed: unknown = JSON.parse(rawArgs);
		return isJsonValue(parsed) ? parsed : rawArgs;
	} catch {
		return rawArgs;
	}
};

export const toolResultText = (result: ToolResult): string =>
	result.type === "text" ? result.text : JSON.stringify(result.value);

type InvocationBase = Pick<
	ToolInvocationRecord,
	"tool_call_id" | "tool_name" | "arguments"
>;

export const completedInvocation = (
	base: InvocationBase,
	result: string,
): ToolInvocationRecord => ({
	...base,
	status: "completed",
	result,
	error: null,
});

export const failedInvocation = (
	base: InvocationBase,
	status: Exclude<ToolInvocationStatus, "completed">,
	kind: string,
	message: string,
): ToolInvocationRecord => ({
	...base,
	status,
	result: null,
	error: { kind, message },
});

/** Text the model sees for a finished invocation. */
export const toolMessageContent = (record: ToolInvocationRecord): string => {
	const message = record.error?.message ?? "";
	switch (record.status) {
		case "completed":
			return record.result ?? "";
		case "blocked":
			return `Blocked: ${message}`;
		case "denied":
			return `Permission denied: ${message}`;
		case "rejected":
			return "Tool execution declined by user";
		case "superseded":
			return `Tool call cancelled: ${message}`;
		case "failed":
			return `Error (${record.error?.kind ?? "unknown"}): ${message}`;
	}
};
