import { ToolExecutionError } from "@tollgate/core";

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
	error instanceof Error && "code" in error;

/** Maps a filesystem failure onto the executor error kinds. */
export const toFsToolError = (
	error: unknown,
	action: string,
	displayPath: string,
): ToolExecutionError => {
	if (error instanceof ToolExecutionError) return error;
	if (isErrnoException(error) && error.code === "ENOENT") {
		return new ToolExecutionError("not_found", `File not found: ${displayPath}`, {
			cause: error,
		});
	}
	const detail = error instanceof Error ? error.message : String(error);
	return new ToolExecutionError(
		"io",
		`Error ${action} ${displayPath}: ${detail}`,
		{ cause: error },
	);
};
