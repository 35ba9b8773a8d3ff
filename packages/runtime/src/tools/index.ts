import type { DependencyKey, Tool } from "@tollgate/core";
import type { SandboxContext } from "../sandbox/context";
import { createBashTool } from "./bash";
import { createGrepTool } from "./grep";
import { type Clock, createNowTool } from "./now";
import { createReadTool } from "./read";
import { createWriteTool } from "./write";

export const createTools = (
	sandboxKey: DependencyKey<SandboxContext>,
	options: { clock?: Clock } = {},
): Tool[] => [
	createReadTool(sandboxKey),
	createWriteTool(sandboxKey),
	createGrepTool(sandboxKey),
	createBashTool(sandboxKey),
	createNowTool(options.clock),
];

export { ToolRegistry } from "./registry";
