import { loadAppConfig } from "./config.js";
import { createSnapshotRepository } from "./store.js";
import { SimulationService } from "./simulation-service.js";
import { SqliteEventStore } from "./event-store/sqlite-event-store.js";

const PROGRESS_INTERVAL = 10;

async function main() {
  const config = loadAppConfig(process.env, "file");
  const started = Date.now();

  const repo = createSnapshotRepository(config);
  await repo.connect();
  const eventStore = new SqliteEventStore(config.eventDbPath);

  try {
    const simulation = new SimulationService(config.generator, repo, eventStore, config.seed);
    const initial = await simulation.init();
    console.log(
      `Initial graph: ${initial.totalNodes} users, ${initial.totalEdges} follows, ` +
        `${initial.friendRelationships} friend pairs (preset ${config.preset}, seed ${config.seed})`,
    );

    const result = await simulation.runToEnd((day) => {
      if (day.day % PROGRESS_INTERVAL === 0 || simulation.isFinished) {
        console.log(
          `Day ${day.day}/${simulation.dayCount - 1}: ${day.summary.totalEdges} follows, ` +
            `${day.summary.friendRelationships} friend pairs, ${day.events.length} events`,
        );
      }
    });

    const counts = Object.entries(simulation.getEventCounts())
      .map(([code, total]) => `${code}=${total}`)
      .join(" ");
    console.log(`Events: ${counts || "none"}`);
    if (result.failedExports > 0) {
      console.error(`${result.failedExports} daily snapshots failed to export`);
    }
    console.log(
      `Done: ${result.daysAdvanced} days in ${((Date.now() - started) / 1000).toFixed(1)}s, ` +
        `final average degree ${result.summary.averageDegree.toFixed(2)}`,
    );
  } finally {
    await repo.disconnect();
    eventStore.close();
  }

  if (config.store === "file") {
    console.log(`Snapshots written to ${config.outputDir}`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
