import { debugLog } from "@tollgate/logger";

/** In-flight exchanges by id, so a separate request can cancel one. */
export class ActiveExchanges {
	private readonly controllers = new Map<string, AbortController>();

	register(exchangeId: string): AbortController {
		const controller = new AbortController();
		this.controllers.set(exchangeId, controller);
		return controller;
	}

	release(exchangeId: string): void {
		this.controllers.delete(exchangeId);
	}

	cancel(exchangeId: string, reason = "cancelled by client"): boolean {
		const controller = this.controllers.get(exchangeId);
		if (!controller || controller.signal.aborted) return false;
		debugLog(`exchange ${exchangeId} cancel requested`);
		controller.abort(new Error(reason));
		return true;
	}

	cancelAll(): number {
		let count = 0;
		for (const exchangeId of [...this.controllers.keys()]) {
			if (this.cancel(exchangeId, "server shutting down")) count += 1;
		}
		return count;
	}

	get size(): number {
		return this.controllers.size;
	}
}
