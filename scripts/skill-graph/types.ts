/**
 * Skill Graph — engine-internal types
 */

import type {
  DependencyKind,
  DependencyStrength,
  LoadedCodeBlock,
  LoadedLesson,
  LoadedModule,
  LoadedSkill,
} from "../../src/registry/index.js";
import type { Finding, ResolutionVerdict } from "../../src/analysis/index.js";

export interface DependencyEdge {
  fromSkillId: string;
  fromSkillName: string;
  targetName: string;
  declaredKind: DependencyKind;
  strength: DependencyStrength;
}

/** Immutable for the whole run; every lookup map is keyed by record name */
export interface Snapshot {
  readonly skills: ReadonlyMap<string, LoadedSkill>;
  readonly skillsById: ReadonlyMap<string, LoadedSkill>;
  readonly modules: ReadonlyMap<string, LoadedModule>;
  readonly codeBlocks: ReadonlyMap<string, LoadedCodeBlock>;
  readonly lessons: readonly LoadedLesson[];
  /** skill id → edges in declaration order (module declarations first) */
  readonly edgesBySkill: ReadonlyMap<string, readonly DependencyEdge[]>;
  readonly edges: readonly DependencyEdge[];
}

export type NodeKind = "skill" | "module" | "code-block" | "unknown";

export interface GraphNode {
  name: string;
  kinds: NodeKind[];
}

export interface DependencyGraph {
  nodes: ReadonlyMap<string, GraphNode>;
  edges: readonly DependencyEdge[];
  outgoing: ReadonlyMap<string, readonly DependencyEdge[]>; // skill name → edges
  incoming: ReadonlyMap<string, readonly DependencyEdge[]>; // target name → edges
}

export interface ResolvedEdge extends DependencyEdge {
  verdict: ResolutionVerdict;
  alternate?: "code-block";
}

export interface StageResult<T> {
  result: T;
  findings: Finding[];
}

export interface ModuleUsage {
  moduleName: string;
  referringSkillIds: ReadonlySet<string>;
  count: number;
}

export interface SkillUsage {
  skillName: string;
  referringSkillIds: ReadonlySet<string>;
  count: number;
}

export interface UsageIndex {
  modules: ReadonlyMap<string, ModuleUsage>;
  skills: ReadonlyMap<string, SkillUsage>;
}
