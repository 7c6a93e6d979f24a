/**
 * Graph Builder
 *
 * Directed multigraph over snapshot names. Self-edges and skill cycles are
 * reported as warnings; nothing is removed and nothing blocks the run.
 */

import type { Finding } from "../../src/analysis/index.js";
import { cyclicSkillDependency, selfDependency } from "./findings.js";
import { compareNames } from "./order.js";
import type { DependencyEdge, DependencyGraph, GraphNode, NodeKind, Snapshot, StageResult } from "./types.js";

function addNode(nodes: Map<string, GraphNode>, name: string, kind: NodeKind): void {
  const node = nodes.get(name);
  if (!node) {
    nodes.set(name, { name, kinds: [kind] });
  } else if (!node.kinds.includes(kind)) {
    node.kinds.push(kind);
  }
}

function pushTo(index: Map<string, DependencyEdge[]>, key: string, edge: DependencyEdge): void {
  const list = index.get(key);
  if (list) list.push(edge);
  else index.set(key, [edge]);
}

// ─── Tarjan's SCC over skill→skill edges ─────────────────────────

export interface SkillCycle {
  /** SCC members, sorted by name */
  members: string[];
  /** Declared edges walked from the first member back to itself */
  path: string[];
}

/** Shortest walk start → … → start inside one SCC, following declaration order */
function walkCycle(start: string, members: ReadonlySet<string>, adj: ReadonlyMap<string, string[]>): string[] {
  const parent = new Map<string, string>();
  const seen = new Set([start]);
  const queue = [start];
  while (queue.length > 0) {
    const v = queue.shift();
    if (v === undefined) break;
    for (const w of adj.get(v) ?? []) {
      if (!members.has(w)) continue;
      if (w === start) {
        const path = [v];
        for (let p = parent.get(v); p !== undefined; p = parent.get(p)) path.push(p);
        return [...path.reverse(), start];
      }
      if (seen.has(w)) continue;
      seen.add(w);
      parent.set(w, v);
      queue.push(w);
    }
  }
  return [start];
}

/**
 * Cycles among skills. An edge participates when its target exists in the
 * skill namespace, whatever kind it was declared as; self-edges are excluded
 * (they are reported as SelfDependency).
 */
export function detectSkillCycles(snapshot: Snapshot): SkillCycle[] {
  const adj = new Map<string, string[]>();
  for (const name of snapshot.skills.keys()) adj.set(name, []);
  for (const e of snapshot.edges) {
    if (e.targetName === e.fromSkillName || !snapshot.skills.has(e.targetName)) continue;
    adj.get(e.fromSkillName)?.push(e.targetName);
  }

  let index = 0;
  const stack: string[] = [];
  const onStack = new Set<string>();
  const indices = new Map<string, number>();
  const sccs: string[][] = [];

  function strongconnect(v: string): number {
    const vIndex = index++;
    indices.set(v, vIndex);
    let low = vIndex;
    stack.push(v);
    onStack.add(v);

    for (const w of adj.get(v) ?? []) {
      const wIndex = indices.get(w);
      if (wIndex === undefined) {
        low = Math.min(low, strongconnect(w));
      } else if (onStack.has(w)) {
        low = Math.min(low, wIndex);
      }
    }

    if (low === vIndex) {
      const scc: string[] = [];
      let w: string | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack.delete(w);
        scc.push(w);
      } while (w !== v);
      if (scc.length > 1) sccs.push(scc.sort(compareNames));
    }
    return low;
  }

  for (const name of snapshot.skills.keys()) {
    if (!indices.has(name)) strongconnect(name);
  }

  return sccs
    .sort((a, b) => compareNames(a[0], b[0]))
    .map((members) => ({ members, path: walkCycle(members[0], new Set(members), adj) }));
}

export function buildDependencyGraph(snapshot: Snapshot): StageResult<DependencyGraph> {
  const nodes = new Map<string, GraphNode>();
  const outgoing = new Map<string, DependencyEdge[]>();
  const incoming = new Map<string, DependencyEdge[]>();
  const findings: Finding[] = [];

  for (const name of snapshot.skills.keys()) addNode(nodes, name, "skill");
  for (const name of snapshot.modules.keys()) addNode(nodes, name, "module");
  for (const name of snapshot.codeBlocks.keys()) addNode(nodes, name, "code-block");

  for (const e of snapshot.edges) {
    if (!nodes.has(e.targetName)) addNode(nodes, e.targetName, "unknown");
    pushTo(outgoing, e.fromSkillName, e);
    pushTo(incoming, e.targetName, e);
    if (e.targetName === e.fromSkillName) findings.push(selfDependency(e));
  }

  for (const cycle of detectSkillCycles(snapshot)) {
    findings.push(cyclicSkillDependency(cycle.members, cycle.path));
  }

  return {
    result: { nodes, edges: snapshot.edges, outgoing, incoming },
    findings,
  };
}
