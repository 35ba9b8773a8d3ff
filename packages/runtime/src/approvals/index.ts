export {
	ApprovalCoordinator,
	type ApprovalCoordinatorOptions,
	type ApprovalOutcome,
	DEFAULT_TICKET_RETENTION_MS,
	type OpenedTicket,
	type OpenTicketRequest,
	type ResolveTicketResult,
} from "./coordinator";
export {
	type ResolveApprovalDeps,
	type ResolveApprovalInput,
	type ResolveApprovalResult,
	resolveApproval,
} from "./resolve";
