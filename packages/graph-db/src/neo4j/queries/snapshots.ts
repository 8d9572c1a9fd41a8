// Cypher queries for daily snapshots: (:User), [:FOLLOWS {date}] and (:Snapshot)

export const UPSERT_USERS = `
  UNWIND $users AS u
  MERGE (n:User {id: u.id})
  SET n.name = u.name, n.latitude = u.latitude, n.longitude = u.longitude,
      n.regionId = u.regionId, n.interests = u.interests, n.createdAt = u.createdAt
`;

export const DELETE_FOLLOWS_FOR_DATE = `
  MATCH (:User)-[r:FOLLOWS {date: $date}]->(:User)
  DELETE r
`;

export const CREATE_FOLLOWS = `
  UNWIND $follows AS f
  MATCH (a:User {id: f.sourceId}), (b:User {id: f.targetId})
  CREATE (a)-[:FOLLOWS {
    date: $date,
    relationshipType: f.relationshipType,
    messageCount: f.messageCount,
    lastInteraction: f.lastInteraction,
    distance: f.distance,
    establishedAt: f.establishedAt
  }]->(b)
`;

export const UPSERT_SNAPSHOT = `
  MERGE (s:Snapshot {date: $date})
  SET s.timestamp = $timestamp, s.totalNodes = $totalNodes, s.totalEdges = $totalEdges,
      s.friendRelationships = $friendRelationships, s.fanRelationships = $fanRelationships,
      s.averageDegree = $averageDegree
`;

export const GET_SNAPSHOT = `
  MATCH (s:Snapshot {date: $date})
  RETURN s
`;

export const GET_ALL_USERS = `
  MATCH (n:User)
  RETURN n
  ORDER BY n.id
`;

export const GET_FOLLOWS_FOR_DATE = `
  MATCH (a:User)-[r:FOLLOWS {date: $date}]->(b:User)
  RETURN a.id AS sourceId, b.id AS targetId, r
`;

export const LIST_SNAPSHOT_DATES = `
  MATCH (s:Snapshot)
  RETURN s.date AS date
  ORDER BY date
`;
