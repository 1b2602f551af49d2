import { createServer } from "node:http";
import { node } from "@elysiajs/node";
import { createApp } from "./index";
import { readEngineConfig } from "./lib/config";
import { errorMessage, logEvent } from "./lib/logger";
import { createRuntime } from "./runtime";
import { startResultsExportWorker } from "./services/jobs/results-export-worker";
import { SessionGateway } from "./ws/Gateway";

async function main() {
  const config = readEngineConfig();
  const runtime = createRuntime(config);
  const app = createApp(runtime, { adapter: node() });

  app.listen({ hostname: "0.0.0.0", port: config.httpPort });

  const wsServer = createServer((_req, res) => {
    res.writeHead(426, { "content-type": "text/plain" });
    res.end("Upgrade Required");
  });
  const gateway = new SessionGateway(wsServer, {
    engine: runtime.engine,
    router: runtime.router,
    resolveHostUserId: runtime.resolveHostUserId,
  });
  wsServer.listen(config.wsPort, "0.0.0.0");

  const exportWorker = runtime.redisUrl ? startResultsExportWorker(runtime.redisUrl, runtime.repository) : null;
  runtime.engine.startSweeper();

  logEvent("info", "api_started", {
    httpPort: config.httpPort,
    wsPort: config.wsPort,
    storeMode: runtime.storeMode,
    resultsMode: runtime.results.mode,
  });

  let stopping = false;
  const stop = async () => {
    const flushed = await runtime.engine.shutdown();
    await gateway.close();
    await new Promise<void>((resolve) => {
      wsServer.close(() => resolve());
    });
    await app.stop();
    await exportWorker?.close();
    await runtime.close();
    return flushed;
  };

  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logEvent("info", "api_stopping", { signal });
    stop()
      .then((flushed) => {
        logEvent("info", "api_stopped", { signal, flushed });
        process.exit(0);
      })
      .catch((error: unknown) => {
        logEvent("error", "api_stop_failed", { signal, error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logEvent("error", "api_start_failed", { error: errorMessage(error) });
  process.exitCode = 1;
});
