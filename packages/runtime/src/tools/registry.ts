import {
	type Tool,
	type ToolContext,
	type ToolDefinition,
	ToolExecutionError,
	type ToolResult,
} from "@tollgate/core";

/** Name → tool lookup; arguments are validated by each tool's schema. */
export class ToolRegistry {
	private readonly tools = new Map<string, Tool>();

	constructor(tools: Tool[]) {
		for (const tool of tools) {
			if (this.tools.has(tool.name)) {
				throw new Error(`Duplicate tool name: ${tool.name}`);
			}
			this.tools.set(tool.name, tool);
		}
	}

	has(name: string): boolean {
		return this.tools.has(name);
	}

	names(): string[] {
		return [...this.tools.keys()];
	}

	definitions(): ToolDefinition[] {
		return [...this.tools.values()].map((tool) => tool.definition);
	}

	requestedTimeoutMs(name: string, rawArgs: string): number | undefined {
		return this.tools.get(name)?.requestedTimeoutMs(rawArgs);
	}

	async execute(
		name: string,
		rawArgs: string,
		ctx: ToolContext,
	): Promise<ToolResult> {
		const tool = this.tools.get(name);
		if (!tool) {
			throw new ToolExecutionError("invalid_input", `Unknown tool: ${name}`);
		}
		return tool.executeRaw(rawArgs, ctx);
	}
}
