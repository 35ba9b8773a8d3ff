import crypto from "node:crypto";
import { debugLog } from "@tollgate/logger";
import type {
	ApprovalDecision,
	ApprovalTicketView,
	JsonValue,
	PersistScope,
} from "@tollgate/shared-types";

export const DEFAULT_TICKET_RETENTION_MS = 30 * 60 * 1000;

export type OpenTicketRequest = {
	exchangeId: string;
	toolCallId: string;
	tool: string;
	arguments: JsonValue;
	rawArgs: string;
	description: string;
	scope: string | null;
};

export type ApprovalOutcome =
	| { decision: "approved"; persist?: PersistScope }
	| { decision: "rejected"; persist?: PersistScope }
	| { decision: "superseded"; reason: string };

export type OpenedTicket = {
	ticket: ApprovalTicketView;
	decision: Promise<ApprovalOutcome>;
};

export type ResolveTicketResult =
	| {
			ok: true;
			ticket: ApprovalTicketView;
			rawArgs: string;
			persist?: PersistScope;
	  }
	| {
			ok: false;
			error: "not_found" | "already_resolved";
			ticket?: ApprovalTicketView;
	  };

type TicketEntry = {
	view: ApprovalTicketView;
	rawArgs: string;
	settle: (outcome: ApprovalOutcome) => void;
	expiry?: NodeJS.Timeout;
};

export type ApprovalCoordinatorOptions = {
	retentionMs?: number;
	now?: () => Date;
	createId?: () => string;
};

/**
 * Pending approval tickets keyed by id. Each ticket owns one deferred
 * decision and makes exactly one terminal transition; terminal tickets stay
 * around for `retentionMs` so late duplicates report `already_resolved`.
 */
export class ApprovalCoordinator {
	private readonly tickets = new Map<string, TicketEntry>();
	private readonly retentionMs: number;
	private readonly now: () => Date;
	private readonly createId: () => string;

	constructor(options: ApprovalCoordinatorOptions = {}) {
		this.retentionMs = options.retentionMs ?? DEFAULT_TICKET_RETENTION_MS;
		this.now = options.now ?? (() => new Date());
		this.createId = options.createId ?? (() => crypto.randomUUID());
	}

	open(request: OpenTicketRequest): OpenedTicket {
		const view: ApprovalTicketView = {
			id: this.createId(),
			exchange_id: request.exchangeId,
			tool_call_id: request.toolCallId,
			tool: request.tool,
			arguments: request.arguments,
			description: request.description,
			scope: request.scope,
			state: "pending",
			reason: null,
			created_at: this.now().toISOString(),
			resolved_at: null,
		};
		let settle: (outcome: ApprovalOutcome) => void = () => {};
		const decision = new Promise<ApprovalOutcome>((resolve) => {
			settle = resolve;
		});
		this.tickets.set(view.id, { view, rawArgs: request.rawArgs, settle });
		debugLog(
			`approval open ticket=${view.id} exchange=${view.exchange_id} tool=${view.tool}`,
		);
		return { ticket: { ...view }, decision };
	}

	resolve(
		ticketId: string,
		decision: ApprovalDecision,
		persist?: PersistScope,
	): ResolveTicketResult {
		const entry = this.tickets.get(ticketId);
		if (!entry) return { ok: false, error: "not_found" };
		if (entry.view.state !== "pending") {
			debugLog(`approval duplicate ticket=${ticketId} state=${entry.view.state}`);
			return { ok: false, error: "already_resolved", ticket: { ...entry.view } };
		}
		const approved = decision === "approve";
		this.finalize(entry, approved ? "approved" : "rejected", null);
		entry.settle(
			approved
				? { decision: "approved", ...(persist ? { persist } : {}) }
				: { decision: "rejected", ...(persist ? { persist } : {}) },
		);
		return {
			ok: true,
			ticket: { ...entry.view },
			rawArgs: entry.rawArgs,
			...(persist ? { persist } : {}),
		};
	}

	supersede(ticketId: string, reason = "superseded"): boolean {
		const entry = this.tickets.get(ticketId);
		if (!entry || entry.view.state !== "pending") return false;
		this.finalize(entry, "superseded", reason);
		entry.settle({ decision: "superseded", reason });
		return true;
	}

	supersedeExchange(exchangeId: string, reason = "superseded"): number {
		let count = 0;
		for (const ticket of this.listPending(exchangeId)) {
			if (this.supersede(ticket.id, reason)) count += 1;
		}
		return count;
	}

	get(ticketId: string): ApprovalTicketView | null {
		const entry = this.tickets.get(ticketId);
		return entry ? { ...entry.view } : null;
	}

	listPending(exchangeId?: string): ApprovalTicketView[] {
		const pending: ApprovalTicketView[] = [];
		for (const entry of this.tickets.values()) {
			if (entry.view.state !== "pending") continue;
			if (exchangeId && entry.view.exchange_id !== exchangeId) continue;
			pending.push({ ...entry.view });
		}
		return pending;
	}

	dispose(): void {
		for (const entry of this.tickets.values()) {
			if (entry.expiry) clearTimeout(entry.expiry);
			if (entry.view.state === "pending") {
				this.finalize(entry, "superseded", "shutdown");
				entry.settle({ decision: "superseded", reason: "shutdown" });
			}
		}
		this.tickets.clear();
	}

	private finalize(
		entry: TicketEntry,
		state: "approved" | "rejected" | "superseded",
		reason: string | null,
	): void {
		entry.view = {
			...entry.view,
			state,
			reason,
			resolved_at: this.now().toISOString(),
		};
		debugLog(`approval ${state} ticket=${entry.view.id}`);
		const expiry = setTimeout(() => {
			this.tickets.delete(entry.view.id);
		}, this.retentionMs);
		expiry.unref();
		entry.expiry = expiry;
	}
}
