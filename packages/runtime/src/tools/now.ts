import type { Tool } from "@tollgate/core";
import { defineTool } from "@tollgate/core";
import { z } from "zod";

export type Clock = () => Date;

const pad = (value: number): string => String(value).padStart(2, "0");

/** RFC 3339 at second precision, in UTC or with the host's offset. */
export const formatDateTime = (date: Date, timezone: "utc" | "local"): string => {
	if (timezone === "utc") return date.toISOString().replace(/\.\d+Z$/, "Z");
	const offset = -date.getTimezoneOffset();
	const sign = offset >= 0 ? "+" : "-";
	const minutes = Math.abs(offset);
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
	return `${day}T${time}${sign}${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`;
};

export const createNowTool = (clock: Clock = () => new Date()): Tool =>
	defineTool({
		name: "now",
		description:
			"Get the current date and time in RFC 3339 format. Only use this when the user asks for it or the current time is needed.",
		input: z.object({
			timezone: z
				.enum(["utc", "local"])
				.optional()
				.describe("'local' for the host's time zone (default) or 'utc'."),
		}),
		execute: (input) =>
			`The current datetime is ${formatDateTime(clock(), input.timezone ?? "local")}.`,
	});
