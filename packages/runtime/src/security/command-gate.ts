import { debugLog, log } from "@tollgate/logger";
import { shellWords, splitControlSegments } from "../utils/shell";

export type CommandCategory =
	| "recursive_delete"
	| "privilege_escalation"
	| "permission_change"
	| "raw_device"
	| "network_fetch"
	| "process_termination"
	| "unbalanced_quoting";

export type CommandVerdict =
	| { allowed: true }
	| {
			allowed: false;
			category: CommandCategory;
			pattern: string;
			message: string;
	  };

type DangerousPattern = {
	category: CommandCategory;
	regex: RegExp;
};

// A command word is not glued to a longer identifier or path component.
const word = (body: string): RegExp =>
	new RegExp(`(?<![\\w.-])(?:${body})(?![\\w.-])`);

const DANGEROUS_PATTERNS: readonly DangerousPattern[] = [
	{
		category: "recursive_delete",
		regex:
			/(?<![\w.-])rm(?:\s+[^\s;&|]+)*?\s+-(?:-(?:recursive|force)\b|[a-zA-Z]*[rRf])/,
	},
	{ category: "recursive_delete", regex: /(?<![\w.-])find\s[^;&|]*\s-delete\b/ },
	{ category: "privilege_escalation", regex: word("sudo|doas|su") },
	{ category: "permission_change", regex: word("chmod|chown|chgrp") },
	{ category: "raw_device", regex: word("dd|fdisk|parted") },
	{ category: "raw_device", regex: /(?<![\w.-])mkfs(?:\.\w+)?(?![\w-])/ },
	{
		category: "raw_device",
		regex: />\s*\/dev\/(?!(?:null|stdout|stderr)(?![\w/]))/,
	},
	{ category: "network_fetch", regex: word("curl|wget") },
	{ category: "process_termination", regex: word("kill|pkill|killall") },
];

const CATEGORY_LABELS: Record<CommandCategory, string> = {
	recursive_delete: "recursive or forced deletion",
	privilege_escalation: "privilege escalation",
	permission_change: "permission or ownership change",
	raw_device: "raw device access",
	network_fetch: "network download",
	process_termination: "process termination",
	unbalanced_quoting: "unbalanced quoting",
};

const blockedMessage = (category: CommandCategory, pattern: string): string =>
	`Command blocked for security reasons. The command contains a dangerous pattern: '${pattern}' (${CATEGORY_LABELS[category]}). Use a safer alternative or ask the user to run it manually.`;

const block = (category: CommandCategory, pattern: string): CommandVerdict => {
	log(`gate blocked command category=${category} pattern=${pattern}`);
	return {
		allowed: false,
		category,
		pattern,
		message: blockedMessage(category, pattern),
	};
};

const matchPatterns = (text: string): CommandVerdict | null => {
	for (const entry of DANGEROUS_PATTERNS) {
		const match = entry.regex.exec(text);
		if (match) return block(entry.category, match[0].trim());
	}
	return null;
};

/**
 * Fixed blocklist for shell commands. It is not configurable and nothing
 * downstream can override a block.
 *
 * Each segment is checked as written and again with quotes and escapes
 * removed, the way the shell will see it. A segment whose quoting never
 * closes cannot be read either way and is blocked.
 */
export const validateCommand = (command: string): CommandVerdict => {
	for (const segment of splitControlSegments(command)) {
		const raw = matchPatterns(segment);
		if (raw) return raw;
		const words = shellWords(segment);
		if (!words) return block("unbalanced_quoting", "unclosed quote");
		const dequoted = matchPatterns(words.join(" "));
		if (dequoted) return dequoted;
	}
	debugLog(`gate allowed command ${command.slice(0, 200)}`);
	return { allowed: true };
};
