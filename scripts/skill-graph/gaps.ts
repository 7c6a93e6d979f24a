/**
 * Gap & Orphan Analyzer
 *
 * Orphans are modules no skill resolves to. Orphans are clustered by
 * category into proposed skills, otherwise matched to the best existing skill
 * to wire them into. Missing references get a did-you-mean hint. Everything
 * here is a suggestion for the report; the registry is never modified.
 */

import type {
  AnalysisPolicy,
  ModuleHealth,
  OrphanCluster,
  ProposedSkill,
  ReferenceSuggestion,
  WiringSuggestion,
} from "../../src/analysis/index.js";
import type { DependencyKind } from "../../src/registry/index.js";
import { compareNames } from "./order.js";
import type { ResolvedEdge, Snapshot } from "./types.js";

export interface GapAnalysis {
  orphans: OrphanCluster[];
  proposedSkills: ProposedSkill[];
  wiring: WiringSuggestion[];
  /** missing target name → closest existing name */
  referenceSuggestions: Map<string, ReferenceSuggestion>;
}

type GapPolicy = Pick<AnalysisPolicy, "minClusterSize" | "suggestionThreshold">;

// ─── Orphans ─────────────────────────────────────────────────────

export function groupOrphans(health: readonly ModuleHealth[]): OrphanCluster[] {
  const byCategory = new Map<string, ModuleHealth[]>();
  for (const h of health) {
    if (h.skillRefCount !== 0) continue;
    const list = byCategory.get(h.category);
    if (list) list.push(h);
    else byCategory.set(h.category, [h]);
  }
  return [...byCategory.entries()]
    .sort(([a], [b]) => compareNames(a, b))
    .map(([category, modules]) => ({
      category,
      modules: [...modules].sort((a, b) => compareNames(a.moduleName, b.moduleName)),
    }));
}

/** True when some single skill declares two or more of the given names, in any kind */
function declaredTogether(snapshot: Snapshot, names: ReadonlySet<string>): boolean {
  for (const edges of snapshot.edgesBySkill.values()) {
    const hits = new Set(edges.filter((e) => names.has(e.targetName)).map((e) => e.targetName));
    if (hits.size >= 2) return true;
  }
  return false;
}

// ─── Wiring ──────────────────────────────────────────────────────

/** skill name → category → distinct modules it already resolves to */
function categoryCoverage(snapshot: Snapshot, resolved: readonly ResolvedEdge[]): Map<string, Map<string, Set<string>>> {
  const coverage = new Map<string, Map<string, Set<string>>>();
  for (const e of resolved) {
    if (e.verdict !== "ResolvesToModule") continue;
    const mod = snapshot.modules.get(e.targetName);
    if (!mod) continue;
    let byCategory = coverage.get(e.fromSkillName);
    if (!byCategory) {
      byCategory = new Map();
      coverage.set(e.fromSkillName, byCategory);
    }
    const mods = byCategory.get(mod.category) ?? new Set<string>();
    mods.add(mod.name);
    byCategory.set(mod.category, mods);
  }
  return coverage;
}

export function suggestWiring(
  orphan: ModuleHealth,
  coverage: Map<string, Map<string, Set<string>>>
): WiringSuggestion {
  let best: { skillName: string; score: number } | null = null;
  for (const [skillName, byCategory] of coverage) {
    const score = byCategory.get(orphan.category)?.size ?? 0;
    if (score === 0) continue;
    if (!best || score > best.score || (score === best.score && compareNames(skillName, best.skillName) < 0)) {
      best = { skillName, score };
    }
  }
  return {
    moduleName: orphan.moduleName,
    category: orphan.category,
    skillName: best?.skillName ?? null,
    score: best?.score ?? 0,
  };
}

// ─── Did-you-mean for missing references ─────────────────────────

function tokenize(name: string): Set<string> {
  return new Set(name.toLowerCase().split(/[^a-z0-9]+/).filter((t) => t.length > 0));
}

export function jaccardSimilarity(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

export function suggestReference(
  targetName: string,
  declaredKind: DependencyKind,
  snapshot: Snapshot,
  threshold: number
): ReferenceSuggestion | undefined {
  const tokens = tokenize(targetName);
  const candidates: { name: string; kind: DependencyKind }[] = [
    ...[...snapshot.modules.keys()].map((name) => ({ name, kind: "module" as const })),
    ...[...snapshot.skills.keys()].map((name) => ({ name, kind: "skill" as const })),
  ];

  let best: ReferenceSuggestion | undefined;
  for (const c of candidates) {
    const similarity = jaccardSimilarity(tokens, tokenize(c.name));
    if (similarity < threshold) continue;
    const better =
      !best ||
      similarity > best.similarity ||
      (similarity === best.similarity && c.kind === declaredKind && best.kind !== declaredKind) ||
      (similarity === best.similarity && c.kind === best.kind && compareNames(c.name, best.name) < 0);
    if (better) best = { name: c.name, kind: c.kind, similarity };
  }
  return best && { ...best, similarity: Math.round(best.similarity * 100) / 100 };
}

// ─── Entry point ─────────────────────────────────────────────────

export function analyzeGaps(
  snapshot: Snapshot,
  health: readonly ModuleHealth[],
  resolved: readonly ResolvedEdge[],
  policy: GapPolicy
): GapAnalysis {
  const orphans = groupOrphans(health);
  const proposedSkills: ProposedSkill[] = [];
  const clustered = new Set<string>();

  for (const cluster of orphans) {
    if (cluster.modules.length < policy.minClusterSize) continue;
    const names = new Set(cluster.modules.map((m) => m.moduleName));
    if (declaredTogether(snapshot, names)) continue;
    for (const n of names) clustered.add(n);
    proposedSkills.push({
      category: cluster.category,
      modules: [...names],
      rationale: `${names.size} orphan modules share category "${cluster.category}" and no existing skill declares more than one of them.`,
    });
  }

  const coverage = categoryCoverage(snapshot, resolved);
  const wiring = orphans
    .flatMap((c) => c.modules)
    .filter((m) => !clustered.has(m.moduleName))
    .map((m) => suggestWiring(m, coverage));

  const referenceSuggestions = new Map<string, ReferenceSuggestion>();
  const seen = new Set<string>();
  for (const e of resolved) {
    if (e.verdict !== "Missing" || seen.has(e.targetName)) continue;
    seen.add(e.targetName);
    const suggestion = suggestReference(e.targetName, e.declaredKind, snapshot, policy.suggestionThreshold);
    if (suggestion) referenceSuggestions.set(e.targetName, suggestion);
  }

  return { orphans, proposedSkills, wiring, referenceSuggestions };
}
