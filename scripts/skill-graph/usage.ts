/**
 * Usage Aggregator
 *
 * Folds resolved edges into per-module and per-skill referrer sets. Strength
 * is ignored: optional dependencies count exactly like required ones. A skill
 * never counts as a referrer of itself.
 */

import type { UsageEntry } from "../../src/analysis/index.js";
import { compareNames } from "./order.js";
import type { ModuleUsage, ResolvedEdge, SkillUsage, Snapshot, UsageIndex } from "./types.js";

export function aggregateUsage(snapshot: Snapshot, resolved: readonly ResolvedEdge[]): UsageIndex {
  const moduleRefs = new Map<string, Set<string>>();
  const skillRefs = new Map<string, Set<string>>();
  for (const name of snapshot.modules.keys()) moduleRefs.set(name, new Set());
  for (const name of snapshot.skills.keys()) skillRefs.set(name, new Set());

  for (const e of resolved) {
    if (e.verdict === "ResolvesToModule") moduleRefs.get(e.targetName)?.add(e.fromSkillId);
    // a self-edge is reported, never counted as use
    else if (e.verdict === "ResolvesToSkill" && e.fromSkillName !== e.targetName) {
      skillRefs.get(e.targetName)?.add(e.fromSkillId);
    }
  }

  const modules = new Map<string, ModuleUsage>();
  for (const [moduleName, refs] of moduleRefs) {
    modules.set(moduleName, { moduleName, referringSkillIds: refs, count: refs.size });
  }
  const skills = new Map<string, SkillUsage>();
  for (const [skillName, refs] of skillRefs) {
    skills.set(skillName, { skillName, referringSkillIds: refs, count: refs.size });
  }
  return { modules, skills };
}

function byCountThenName(a: UsageEntry, b: UsageEntry): number {
  return b.count - a.count || compareNames(a.name, b.name);
}

function toEntry(name: string, refs: ReadonlySet<string>): UsageEntry {
  return { name, count: refs.size, referringSkillIds: [...refs].sort(compareNames) };
}

/** All modules, most-used first; ties broken by name */
export function rankModuleUsage(usage: UsageIndex): UsageEntry[] {
  return [...usage.modules.values()]
    .map((u) => toEntry(u.moduleName, u.referringSkillIds))
    .sort(byCountThenName);
}

/** Skills that at least one other skill depends on */
export function rankSkillUsage(usage: UsageIndex): UsageEntry[] {
  return [...usage.skills.values()]
    .filter((u) => u.count > 0)
    .map((u) => toEntry(u.skillName, u.referringSkillIds))
    .sort(byCountThenName);
}

export function skillRefCount(usage: UsageIndex, moduleName: string): number {
  return usage.modules.get(moduleName)?.count ?? 0;
}
