import type { JsonValue, ToolResult } from "./tools";

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export function isToolResult(value: unknown): value is ToolResult {
	if (!isRecord(value)) return false;
	if (value.type === "text") return typeof value.text === "string";
	return value.type === "json" && "value" in value && isJsonValue(value.value);
}

export function isJsonValue(value: unknown): value is JsonValue {
	if (value === null) return true;
	switch (typeof value) {
		case "string":
		case "boolean":
			return true;
		case "number":
			return Number.isFinite(value);
		case "object":
			if (Array.isArray(value)) return value.every(isJsonValue);
			return isRecord(value) && Object.values(value).every(isJsonValue);
		default:
			return false;
	}
}
