import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SqliteEventStore } from "../event-store/sqlite-event-store.js";
import { makeEvent } from "./fixtures.js";

describe("SqliteEventStore", () => {
  let store: SqliteEventStore;

  beforeEach(() => {
    store = new SqliteEventStore(); // in-memory
  });

  afterEach(() => {
    store.close();
  });

  it("appends and retrieves events", () => {
    store.append([makeEvent(), makeEvent({ sourceId: 2, targetId: 3 })]);
    const all = store.getAll();
    expect(all).toHaveLength(2);
    expect(all[0]).toEqual({ id: 1, ...makeEvent() });
    expect(all[1].id).toBe(2);
  });

  it("orders by day, then insertion", () => {
    store.append([makeEvent({ day: 3 }), makeEvent({ day: 1, sourceId: 5 }), makeEvent({ day: 1, sourceId: 6 })]);
    expect(store.getAll().map((e) => [e.day, e.sourceId])).toEqual([
      [1, 5],
      [1, 6],
      [3, 0],
    ]);
  });

  it("queries by day range", () => {
    store.append([makeEvent({ day: 1 }), makeEvent({ day: 2 }), makeEvent({ day: 3 })]);
    expect(store.getByDayRange(1, 2).map((e) => e.day)).toEqual([1, 2]);
  });

  it("queries by user on either side", () => {
    store.append([
      makeEvent({ sourceId: 0, targetId: 1 }),
      makeEvent({ sourceId: 2, targetId: 0 }),
      makeEvent({ sourceId: 3, targetId: 4 }),
    ]);
    expect(store.getByUser(0)).toHaveLength(2);
  });

  it("limits user queries to a day range", () => {
    store.append([makeEvent({ day: 1 }), makeEvent({ day: 4 }), makeEvent({ day: 9 })]);
    expect(store.getByUser(0, 2, 8).map((e) => e.day)).toEqual([4]);
    expect(store.getByUser(0, 4).map((e) => e.day)).toEqual([4, 9]);
  });

  it("queries by pair in both directions", () => {
    store.append([
      makeEvent({ sourceId: 0, targetId: 1 }),
      makeEvent({ sourceId: 1, targetId: 0, eventCode: "FOLLOW_BACK", relationBefore: "fan", relationAfter: "friend" }),
      makeEvent({ sourceId: 0, targetId: 2 }),
    ]);
    expect(store.getByPair(1, 0).map((e) => e.eventCode)).toEqual(["NEW_CONNECTION", "FOLLOW_BACK"]);
  });

  it("counts events by code", () => {
    store.append([
      makeEvent({ day: 1 }),
      makeEvent({ day: 2 }),
      makeEvent({ day: 2, eventCode: "FAN_LOST", relationBefore: "fan", relationAfter: "none" }),
    ]);
    expect(store.countByCode()).toEqual({ NEW_CONNECTION: 2, FAN_LOST: 1 });
    expect(store.countByCode(2, 2)).toEqual({ NEW_CONNECTION: 1, FAN_LOST: 1 });
  });

  it("returns empty results on an empty store", () => {
    expect(store.getAll()).toEqual([]);
    expect(store.countByCode()).toEqual({});
  });
});
