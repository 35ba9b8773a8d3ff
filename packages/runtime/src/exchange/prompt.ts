import type { BaseMessage, SessionStore } from "@tollgate/core";
import type { Attachment, SessionSnapshot } from "@tollgate/shared-types";

/** User turn as sent to the model, with attachments inlined ahead of it. */
export const formatUserPrompt = (
	message: string,
	attachments: readonly Attachment[] = [],
): string => {
	if (!attachments.length) return message;
	const blocks = attachments.map(
		(attachment) =>
			`File: ${attachment.filename}\n\`\`\`\n${attachment.content}\n\`\`\``,
	);
	return `${blocks.join("\n\n")}\n\nUser query: ${message}`;
};

/**
 * Replays stored user and assistant text. Tool traffic of earlier turns is
 * not replayed.
 */
export const buildHistoryMessages = async (
	snapshot: SessionSnapshot,
	store: Pick<SessionStore, "readSourceContent">,
): Promise<BaseMessage[]> => {
	const history: BaseMessage[] = [];
	for (const message of snapshot.messages) {
		if (message.role === "assistant") {
			if (message.content) {
				history.push({ role: "assistant", content: message.content });
			}
			continue;
		}
		const attachments: Attachment[] = [];
		for (const source of message.sources) {
			const content = await store.readSourceContent(source.id);
			if (content !== null) {
				attachments.push({ filename: source.title, content });
			}
		}
		history.push({
			role: "user",
			content: formatUserPrompt(message.content, attachments),
		});
	}
	return history;
};
