/**
 * Finding constructors and join helpers.
 *
 * Each stage (and each consistency chunk) owns its own finding list;
 * lists are only ever concatenated at join points, never shared.
 */

import type { Finding, FindingType } from "../../src/analysis/index.js";
import type { DependencyKind } from "../../src/registry/index.js";
import type { DependencyEdge } from "./types.js";

function edgeFields(edge: DependencyEdge) {
  return {
    skillId: edge.fromSkillId,
    skillName: edge.fromSkillName,
    targetName: edge.targetName,
    declaredKind: edge.declaredKind,
    strength: edge.strength,
  };
}

export function missingReference(edge: DependencyEdge, matchesCodeBlock: boolean): Finding {
  const hint = matchesCodeBlock ? ` (a code block named "${edge.targetName}" exists)` : "";
  return {
    type: "Missing",
    severity: "error",
    message: `Skill "${edge.fromSkillName}" depends on ${edge.declaredKind} "${edge.targetName}", which exists in neither namespace${hint}.`,
    ...edgeFields(edge),
    ...(matchesCodeBlock && { alternate: "code-block" as const }),
  };
}

export function kindMismatch(edge: DependencyEdge, actualKind: DependencyKind): Finding {
  return {
    type: "KindMismatch",
    severity: "warning",
    message: `Skill "${edge.fromSkillName}" declares "${edge.targetName}" as a ${edge.declaredKind}, but it only exists as a ${actualKind}.`,
    ...edgeFields(edge),
  };
}

export function ambiguousReference(edge: DependencyEdge): Finding {
  return {
    type: "ResolvesToBoth",
    severity: "warning",
    message: `"${edge.targetName}" (declared by "${edge.fromSkillName}") exists both as a module and as a skill.`,
    ...edgeFields(edge),
  };
}

export function ambiguousLessonTarget(lessonId: string, targetName: string): Finding {
  return {
    type: "ResolvesToBoth",
    severity: "warning",
    message: `Lesson "${lessonId}" targets "${targetName}", which exists both as a module and as a skill; mapped to the module.`,
    lessonId,
    targetName,
  };
}

export function selfDependency(edge: DependencyEdge): Finding {
  return {
    type: "SelfDependency",
    severity: "warning",
    message: `Skill "${edge.fromSkillName}" declares a dependency on itself.`,
    ...edgeFields(edge),
  };
}

export function cyclicSkillDependency(members: string[], path: string[]): Finding {
  return {
    type: "CyclicSkillDependency",
    severity: "warning",
    message: `Skills ${members.join(", ")} depend on each other in a cycle: ${path.join(" → ")}`,
    skillName: members[0],
    members,
    cyclePath: path,
  };
}

export function mergeFindings(...lists: ReadonlyArray<readonly Finding[]>): Finding[] {
  return lists.flatMap((list) => [...list]);
}

export function countFindings(findings: readonly Finding[], type: FindingType): number {
  return findings.filter((f) => f.type === type).length;
}
