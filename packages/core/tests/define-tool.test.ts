import { describe, expect, test } from "vitest";
import { z } from "zod";
import { createToolContext } from "../src/tools/context";
import { defineTool } from "../src/tools/define";
import { ToolExecutionError } from "../src/tools/errors";

const echoTool = defineTool({
	name: "echo",
	description: "Echo a message",
	input: z.object({
		message: z.string(),
		timeout: z.number().int().positive().optional(),
	}),
	execute: (input) => input.message,
	timeoutSeconds: (input) => input.timeout,
});

describe("defineTool", () => {
	test("builds a closed JSON schema from the zod input", () => {
		const parameters = echoTool.definition.parameters;
		expect(parameters.type).toBe("object");
		expect(parameters.additionalProperties).toBe(false);
		expect(parameters.required).toEqual(["message"]);
		expect(Object.keys(parameters.properties ?? {})).toEqual([
			"message",
			"timeout",
		]);
	});

	test("validates raw JSON arguments before executing", async () => {
		const ctx = createToolContext();
		await expect(
			echoTool.executeRaw(JSON.stringify({ message: "hi" }), ctx),
		).resolves.toEqual({ type: "text", text: "hi" });

		await expect(echoTool.executeRaw("{not json", ctx)).rejects.toThrow(
			"Invalid tool arguments JSON for echo",
		);
		const failure = await echoTool
			.executeRaw(JSON.stringify({ message: 3 }), ctx)
			.catch((error: unknown) => error);
		expect(failure).toBeInstanceOf(ToolExecutionError);
		expect(failure instanceof ToolExecutionError && failure.kind).toBe(
			"invalid_input",
		);
	});

	test("wraps non-string results as json", async () => {
		const tool = defineTool({
			name: "count",
			description: "Count",
			input: z.object({}),
			execute: () => ({ total: 2 }),
		});
		await expect(tool.executeRaw("{}", createToolContext())).resolves.toEqual({
			type: "json",
			value: { total: 2 },
		});
	});

	test("reports the requested timeout in milliseconds", () => {
		expect(
			echoTool.requestedTimeoutMs(JSON.stringify({ message: "a", timeout: 5 })),
		).toBe(5000);
		expect(
			echoTool.requestedTimeoutMs(JSON.stringify({ message: "a" })),
		).toBeUndefined();
		expect(echoTool.requestedTimeoutMs("oops")).toBeUndefined();
	});
});
