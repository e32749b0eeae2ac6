import type { KeyPoint, Polarity } from "./base.js";
import { dice } from "./text.js";

export interface RoleStance {
  polarity: Polarity;
  turnIndex: number;
  text: string;
}

export interface PointCluster {
  points: KeyPoint[];
  terms: Set<string>;
  /** Latest stance of each role in this cluster */
  stances: Map<string, RoleStance>;
}

/** Single-linkage similarity: best match against any member point. */
function clusterSimilarity(cluster: PointCluster, point: KeyPoint): number {
  let best = 0;
  for (const member of cluster.points) {
    best = Math.max(best, dice(member.terms, point.terms));
  }
  return best;
}

/**
 * Group points greedily, in order: each point joins the most similar existing
 * cluster when the similarity reaches the threshold, otherwise starts a new one.
 * A role's later stance in a cluster replaces its earlier one.
 */
export function clusterPoints(points: KeyPoint[], threshold: number): PointCluster[] {
  const clusters: PointCluster[] = [];
  for (const point of points) {
    let target: PointCluster | undefined;
    let bestScore = 0;
    for (const cluster of clusters) {
      const score = clusterSimilarity(cluster, point);
      if (score >= threshold && score > bestScore) {
        target = cluster;
        bestScore = score;
      }
    }
    if (!target) {
      target = { points: [], terms: new Set(), stances: new Map() };
      clusters.push(target);
    }
    target.points.push(point);
    for (const t of point.terms) target.terms.add(t);
    target.stances.set(point.roleId, {
      polarity: point.polarity,
      turnIndex: point.turnIndex,
      text: point.text,
    });
  }
  return clusters;
}

/** Roles whose latest stance in the cluster is not opposed. */
export function supportersOf(cluster: PointCluster): string[] {
  return [...cluster.stances.entries()]
    .filter(([, s]) => s.polarity >= 0)
    .map(([roleId]) => roleId);
}
