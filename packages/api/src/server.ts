import { createHTTPServer } from "@trpc/server/adapters/standalone";
import cors from "cors";
import { appRouter } from "./app-router.js";
import { loadAppConfig } from "./config.js";
import { createSnapshotRepository } from "./store.js";
import { SimulationService } from "./simulation-service.js";
import { SqliteEventStore } from "./event-store/sqlite-event-store.js";
import type { Context } from "./trpc.js";

async function main() {
  const config = loadAppConfig();

  const repo = createSnapshotRepository(config);
  await repo.connect();

  const eventStore = new SqliteEventStore(config.eventDbPath);
  const simulation = new SimulationService(config.generator, repo, eventStore, config.seed);
  const initial = await simulation.init();

  console.log(
    `Generated ${initial.totalNodes} users and ${initial.totalEdges} follows (preset ${config.preset}, seed ${config.seed})`,
  );
  console.log(`Simulation ready at day ${simulation.currentDay} of ${simulation.dayCount}, store: ${config.store}`);

  const server = createHTTPServer({
    middleware: cors(),
    router: appRouter,
    createContext: (): Context => ({ simulation }),
  });

  const shutdown = async () => {
    server.server.close();
    await repo.disconnect();
    eventStore.close();
    console.log("API server stopped");
  };
  process.once("SIGINT", () => {
    shutdown().catch(console.error);
  });
  process.once("SIGTERM", () => {
    shutdown().catch(console.error);
  });

  server.listen(config.port);
  console.log(`API server listening on http://localhost:${config.port}`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
