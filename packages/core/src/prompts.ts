import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

const promptPath = fileURLToPath(
	new URL("../prompts/system.md", import.meta.url),
);

export const getDefaultSystemPromptPath = (): string => promptPath;

export const loadSystemPrompt = async (
	workspaceRoot: string,
	templatePath: string = promptPath,
): Promise<string> => {
	const template = await readFile(templatePath, "utf8");
	return template.replaceAll("{{workspace_root}}", workspaceRoot).trim();
};
