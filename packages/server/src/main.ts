import { serve } from "@hono/node-server";
import { describeError, log } from "@tollgate/logger";
import { createRuntime, resolveRuntimeConfig } from "@tollgate/runtime";
import { createApp } from "./app";
import { ActiveExchanges } from "./exchanges";

const main = async (): Promise<void> => {
	const workspaceRoot = process.env.TOLLGATE_WORKSPACE?.trim() || process.cwd();
	const config = await resolveRuntimeConfig({ workspaceRoot });
	const runtime = await createRuntime(config);
	const exchanges = new ActiveExchanges();
	const app = createApp(runtime, exchanges);

	const server = serve(
		{ fetch: app.fetch, hostname: config.server.host, port: config.server.port },
		(info) => {
			log(
				`server listening on http://${config.server.host}:${info.port} workspace=${config.workspaceRoot} model=${config.model.name}`,
			);
		},
	);

	let shuttingDown = false;
	const shutdown = async (signal: string): Promise<void> => {
		if (shuttingDown) return;
		shuttingDown = true;
		const cancelled = exchanges.cancelAll();
		log(`${signal} received, shutting down (cancelled ${cancelled} exchanges)`);
		server.close();
		await runtime.close();
		process.exit(0);
	};
	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.on(signal, () => {
			shutdown(signal).catch((error) => {
				log(`shutdown failed: ${describeError(error)}`);
				process.exit(1);
			});
		});
	}
};

main().catch((error) => {
	log(`failed to start: ${describeError(error)}`);
	process.exit(1);
});
