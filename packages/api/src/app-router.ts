import { router } from "./trpc.js";
import { simulationRouter } from "./routers/simulation.js";
import { graphRouter } from "./routers/graph.js";

export const appRouter = router({
  simulation: simulationRouter,
  graph: graphRouter,
});

export type AppRouter = typeof appRouter;
