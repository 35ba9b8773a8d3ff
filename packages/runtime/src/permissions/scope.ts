import path from "node:path";
import { shellWords } from "../utils/shell";
import { normalizeCommand } from "./rules";

// Prefixes that run another program; remembering them would allow anything.
const WRAPPERS = new Set([
	"builtin",
	"chrt",
	"command",
	"env",
	"ionice",
	"nice",
	"nohup",
	"stdbuf",
	"sudo",
	"time",
	"timeout",
	"xargs",
]);

// Tools whose second word selects what actually runs.
const SUBCOMMAND_TOOLS = new Set([
	"cargo",
	"docker",
	"gh",
	"git",
	"go",
	"kubectl",
	"npm",
	"npx",
	"pnpm",
	"yarn",
]);

// Subcommands that launch a third named target, e.g. `npm run build`.
const LAUNCHERS: Record<string, "any" | readonly string[]> = {
	npx: "any",
	npm: ["exec", "run"],
	pnpm: ["dlx", "exec"],
	yarn: ["dlx"],
};

const PROGRAM = /^[A-Za-z0-9._+@:-]+$/;
const SUBCOMMAND = /^[A-Za-z0-9][A-Za-z0-9:_-]*$/;
const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

/**
 * Scope hint for one command segment: the program name, or two or three
 * words for subcommand-style tools ("git push", "npx vitest run").
 */
export const deriveRememberCommand = (segment: string): string | null => {
	const words = shellWords(normalizeCommand(segment));
	const [first, second, third] = words ?? [];
	if (!first || ENV_ASSIGNMENT.test(first)) return null;
	const program = path.basename(first);
	if (!PROGRAM.test(program) || /^\.+$/.test(program)) return null;
	if (WRAPPERS.has(program)) return null;
	if (!SUBCOMMAND_TOOLS.has(program) || !second || !SUBCOMMAND.test(second)) {
		return program;
	}
	const launcher = LAUNCHERS[program];
	const launches =
		launcher === "any" || (launcher !== undefined && launcher.includes(second));
	if (launches && third && SUBCOMMAND.test(third)) {
		return `${program} ${second} ${third}`;
	}
	return `${program} ${second}`;
};
