export { appRouter, type AppRouter } from "./app-router.js";
export type { Context } from "./trpc.js";
export type { StoredEvent, IEventStore } from "./event-store/types.js";
export { SqliteEventStore } from "./event-store/sqlite-event-store.js";
export { SimulationService } from "./simulation-service.js";
export type { AdvanceDayResult, RunResult, UserView, RelationshipView } from "./simulation-service.js";
export { NameGenerator, loadNameLists } from "./names/name-generator.js";
export type { NameLists } from "./names/name-generator.js";
export { loadAppConfig, deepMerge, DEFAULT_SEED } from "./config.js";
export type { AppConfig, StoreKind } from "./config.js";
export { createSnapshotRepository } from "./store.js";
