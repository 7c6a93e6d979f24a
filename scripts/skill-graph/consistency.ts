/**
 * Consistency Checker
 *
 * Resolves every edge's target against the module and skill namespaces by
 * exact, case-sensitive name. Every edge receives exactly one verdict.
 */

import type { Finding, ResolutionVerdict } from "../../src/analysis/index.js";
import type { DependencyKind } from "../../src/registry/index.js";
import { ambiguousReference, kindMismatch, missingReference } from "./findings.js";
import type { DependencyEdge, DependencyGraph, ResolvedEdge, Snapshot, StageResult } from "./types.js";

const DEFAULT_CHUNK_SIZE = 64;

export function resolveTarget(
  targetName: string,
  declaredKind: DependencyKind,
  snapshot: Snapshot
): ResolutionVerdict {
  const isModule = snapshot.modules.has(targetName);
  const isSkill = snapshot.skills.has(targetName);

  if (isModule && isSkill) return "ResolvesToBoth";
  if (!isModule && !isSkill) return "Missing";
  const actual: DependencyKind = isModule ? "module" : "skill";
  if (actual !== declaredKind) return "KindMismatch";
  return actual === "module" ? "ResolvesToModule" : "ResolvesToSkill";
}

export function isResolved(verdict: ResolutionVerdict): boolean {
  return verdict === "ResolvesToModule" || verdict === "ResolvesToSkill";
}

function otherKind(kind: DependencyKind): DependencyKind {
  return kind === "module" ? "skill" : "module";
}

function resolveChunk(chunk: readonly DependencyEdge[], snapshot: Snapshot): StageResult<ResolvedEdge[]> {
  const resolved: ResolvedEdge[] = [];
  const findings: Finding[] = [];

  for (const edge of chunk) {
    const verdict = resolveTarget(edge.targetName, edge.declaredKind, snapshot);
    switch (verdict) {
      case "Missing": {
        const matchesCodeBlock = snapshot.codeBlocks.has(edge.targetName);
        findings.push(missingReference(edge, matchesCodeBlock));
        resolved.push({ ...edge, verdict, ...(matchesCodeBlock && { alternate: "code-block" as const }) });
        continue;
      }
      case "KindMismatch":
        findings.push(kindMismatch(edge, otherKind(edge.declaredKind)));
        break;
      case "ResolvesToBoth":
        findings.push(ambiguousReference(edge));
        break;
      case "ResolvesToModule":
      case "ResolvesToSkill":
        break;
    }
    resolved.push({ ...edge, verdict });
  }
  return { result: resolved, findings };
}

/**
 * Edges are resolved in independent chunks, each collecting its own
 * findings; chunks are joined in order so output is deterministic.
 */
export function checkConsistency(
  snapshot: Snapshot,
  graph: DependencyGraph,
  chunkSize = DEFAULT_CHUNK_SIZE
): StageResult<ResolvedEdge[]> {
  const size = Math.max(1, Math.floor(chunkSize));
  const chunks: StageResult<ResolvedEdge[]>[] = [];
  for (let i = 0; i < graph.edges.length; i += size) {
    chunks.push(resolveChunk(graph.edges.slice(i, i + size), snapshot));
  }
  return {
    result: chunks.flatMap((c) => c.result),
    findings: chunks.flatMap((c) => c.findings),
  };
}
