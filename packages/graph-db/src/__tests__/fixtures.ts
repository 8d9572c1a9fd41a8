import type { DailySnapshot } from "../types/graph.js";

export function makeSnapshot(date: string, friendCount = 1): DailySnapshot {
  return {
    date,
    users: [
      {
        id: 0,
        name: "Ada Park",
        latitude: 12.5,
        longitude: -40.25,
        regionId: 1,
        interests: ["interest_0", "interest_3"],
        createdAt: "2023-09-10T00:00:00.000Z",
      },
      {
        id: 1,
        latitude: -5,
        longitude: 100,
        regionId: 0,
        interests: [],
        createdAt: "2023-11-02T00:00:00.000Z",
      },
    ],
    follows: [
      {
        sourceId: 0,
        targetId: 1,
        relationshipType: "friend",
        messageCount: 4,
        lastInteraction: "2024-01-02T00:00:00.000Z",
        distance: 4.7,
        establishedAt: "2023-12-01T00:00:00.000Z",
      },
      {
        sourceId: 1,
        targetId: 0,
        relationshipType: "friend",
        messageCount: 0,
        lastInteraction: null,
        distance: 4.7,
        establishedAt: "2023-12-01T00:00:00.000Z",
      },
    ],
    metadata: {
      date,
      totalNodes: 2,
      totalEdges: 2,
      friendRelationships: friendCount,
      fanRelationships: 0,
      averageDegree: 2,
    },
  };
}
