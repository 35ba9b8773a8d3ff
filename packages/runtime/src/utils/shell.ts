export type ShellPiece =
	| { kind: "text"; text: string }
	| { kind: "control"; op: string }
	| { kind: "redirect"; op: string };

// Longest operators first so `2>>` wins over `2>` and `||` over `|`.
const OPERATORS: readonly (readonly [string, "control" | "redirect"])[] = [
	["2>>", "redirect"],
	["2>", "redirect"],
	[">>", "redirect"],
	["|&", "control"],
	["||", "control"],
	["&&", "control"],
	["|", "control"],
	[">", "redirect"],
	["<", "redirect"],
	[";", "control"],
	["\n", "control"],
];

/**
 * Cuts a command line at operators that sit outside quotes. Text between
 * operators is returned untouched, quotes and escapes included.
 */
export const scanShell = (command: string): ShellPiece[] => {
	const pieces: ShellPiece[] = [];
	let text = "";
	let quote: "'" | '"' | null = null;
	let index = 0;
	const flush = (): void => {
		if (text) pieces.push({ kind: "text", text });
		text = "";
	};
	while (index < command.length) {
		const char = command[index];
		if (char === "\\" && quote !== "'") {
			text += command.slice(index, index + 2);
			index += 2;
			continue;
		}
		if (quote) {
			if (char === quote) quote = null;
			text += char;
			index += 1;
			continue;
		}
		if (char === "'" || char === '"') {
			quote = char;
			text += char;
			index += 1;
			continue;
		}
		const operator = OPERATORS.find(([op]) => command.startsWith(op, index));
		if (operator) {
			const [op, kind] = operator;
			flush();
			pieces.push({ kind, op });
			index += op.length;
			continue;
		}
		text += char;
		index += 1;
	}
	flush();
	return pieces;
};

/** Sub-commands joined by control operators; redirects stay in their segment. */
export const splitControlSegments = (command: string): string[] => {
	const segments: string[] = [];
	let current = "";
	const push = (): void => {
		if (current.trim()) segments.push(current.trim());
		current = "";
	};
	for (const piece of scanShell(command)) {
		if (piece.kind === "control") push();
		else current += piece.kind === "text" ? piece.text : piece.op;
	}
	push();
	return segments;
};

/** Words of one segment with quotes removed; null when a quote is left open. */
export const shellWords = (segment: string): string[] | null => {
	const words: string[] = [];
	let word = "";
	let started = false;
	let quote: "'" | '"' | null = null;
	for (let index = 0; index < segment.length; index += 1) {
		const char = segment[index];
		if (char === "\\" && quote !== "'") {
			const next = segment[index + 1];
			if (next === undefined) return null;
			word += next;
			started = true;
			index += 1;
		} else if (quote) {
			if (char === quote) quote = null;
			else word += char;
		} else if (char === "'" || char === '"') {
			quote = char;
			started = true;
		} else if (/\s/.test(char)) {
			if (started) words.push(word);
			word = "";
			started = false;
		} else {
			word += char;
			started = true;
		}
	}
	if (quote) return null;
	if (started) words.push(word);
	return words;
};
