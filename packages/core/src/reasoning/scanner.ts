export const REASONING_OPEN_MARKER = "<think>";
export const REASONING_CLOSE_MARKER = "</think>";

export type ScannerState = "text" | "reasoning";

export type ScanOutput = {
	content: string;
	reasoning: string;
};

// Length of the longest suffix of `input` that could still grow into `marker`.
const partialMarkerLength = (input: string, marker: string): number => {
	const max = Math.min(marker.length - 1, input.length);
	for (let length = max; length > 0; length -= 1) {
		if (marker.startsWith(input.slice(input.length - length))) {
			return length;
		}
	}
	return 0;
};

/**
 * Splits a streamed text channel into display content and reasoning
 * segments delimited by `<think>`/`</think>`. Work per delta is proportional
 * to the delta; a marker split across deltas is held back until it can be
 * decided. A segment still open at `finish()` is closed implicitly.
 */
export class ReasoningScanner {
	private mode: ScannerState = "text";
	private pending = "";
	private contentBuffer = "";
	private reasoningBuffer = "";
	private separatorDue = false;

	get state(): ScannerState {
		return this.mode;
	}

	get content(): string {
		return this.contentBuffer;
	}

	get reasoning(): string | null {
		return this.reasoningBuffer.length ? this.reasoningBuffer : null;
	}

	push(delta: string): ScanOutput {
		const output: ScanOutput = { content: "", reasoning: "" };
		let input = this.pending + delta;
		this.pending = "";
		while (input.length > 0) {
			const marker =
				this.mode === "text" ? REASONING_OPEN_MARKER : REASONING_CLOSE_MARKER;
			const index = input.indexOf(marker);
			if (index >= 0) {
				this.emit(input.slice(0, index), output);
				input = input.slice(index + marker.length);
				this.toggle();
				continue;
			}
			const held = partialMarkerLength(input, marker);
			this.emit(input.slice(0, input.length - held), output);
			this.pending = input.slice(input.length - held);
			break;
		}
		return output;
	}

	finish(): ScanOutput {
		const output: ScanOutput = { content: "", reasoning: "" };
		this.emit(this.pending, output);
		this.pending = "";
		this.mode = "text";
		return output;
	}

	private toggle(): void {
		if (this.mode === "text") {
			this.mode = "reasoning";
			this.separatorDue = this.reasoningBuffer.length > 0;
			return;
		}
		this.mode = "text";
	}

	private emit(text: string, output: ScanOutput): void {
		if (!text) return;
		if (this.mode === "text") {
			this.contentBuffer += text;
			output.content += text;
			return;
		}
		const chunk = this.separatorDue ? `\n\n${text}` : text;
		this.separatorDue = false;
		this.reasoningBuffer += chunk;
		output.reasoning += chunk;
	}
}
