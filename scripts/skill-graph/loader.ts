/**
 * Registry Loader
 *
 * Validates a raw registry export record-by-record and builds the immutable
 * Snapshot every later stage reads. Fails fast with MALFORMED_RECORD or
 * DUPLICATE_RECORD naming the offending record; produces nothing else.
 */

import { readFileSync } from "node:fs";
import { Value } from "@sinclair/typebox/value";
import type { TSchema, Static } from "@sinclair/typebox";
import {
  CodeBlock,
  DEFAULT_MODULE_CATEGORY,
  DEFAULT_MODULE_STATUS,
  Lesson,
  Module,
  RegistryExport,
  Skill,
  SkillModuleDeclaration,
  SkillSkillDeclaration,
  type DeclaredStrength,
  type DependencyKind,
  type DependencyStrength,
  type LoadedCodeBlock,
  type LoadedLesson,
  type LoadedModule,
  type LoadedSkill,
  type RegistryCollection,
} from "../../src/registry/index.js";
import { duplicateRecord, malformedRecord } from "./errors.js";
import type { DependencyEdge, Snapshot } from "./types.js";

const STRENGTH_CODES: Record<DeclaredStrength, DependencyStrength> = {
  required: "required",
  optional: "optional",
  R: "required",
  D: "required",
  O: "optional",
};

export function normalizeStrength(strength: DeclaredStrength): DependencyStrength {
  return STRENGTH_CODES[strength];
}

function recordIdOf(record: unknown): string | undefined {
  if (typeof record === "object" && record !== null && "id" in record && typeof record.id === "string" && record.id) {
    return record.id;
  }
  return undefined;
}

function validateCollection<T extends TSchema>(
  schema: T,
  collection: RegistryCollection,
  records: readonly unknown[] | undefined
): Static<T>[] {
  const valid: Static<T>[] = [];
  (records ?? []).forEach((record, index) => {
    if (Value.Check(schema, record)) {
      valid.push(record);
      return;
    }
    const first = Value.Errors(schema, record).First();
    const recordId = recordIdOf(record);
    const path = first?.path || "/";
    throw malformedRecord(
      `${collection}[${index}]${recordId ? ` (id "${recordId}")` : ""}: ${path} ${first?.message ?? "does not match schema"}`,
      { collection, index, recordId, path }
    );
  });
  return valid;
}

// Only id, name and the edge fields are load-bearing; prose fields default.
function withSkillDefaults(s: Skill): LoadedSkill {
  return { id: s.id, name: s.name, description: s.description ?? "", kind: s.kind ?? "" };
}

function withModuleDefaults(m: Module): LoadedModule {
  return {
    id: m.id,
    name: m.name,
    description: m.description ?? "",
    category: m.category || DEFAULT_MODULE_CATEGORY,
    status: m.status || DEFAULT_MODULE_STATUS,
  };
}

function withCodeBlockDefaults(b: CodeBlock): LoadedCodeBlock {
  return { id: b.id, name: b.name, language: b.language ?? "", tags: b.tags ?? [] };
}

function withLessonDefaults(l: Lesson): LoadedLesson {
  return {
    id: l.id,
    title: l.title ?? "",
    content: l.content ?? "",
    category: l.category ?? "",
    sourceProject: l.sourceProject ?? "",
    targets: l.targets ?? [],
  };
}

function indexUnique<T extends { id: string }>(
  records: readonly T[],
  collection: RegistryCollection,
  nameOf?: (record: T) => string
): Map<string, T> {
  const byId = new Map<string, T>();
  const byName = new Map<string, T>();
  records.forEach((record, index) => {
    if (byId.has(record.id)) {
      throw duplicateRecord(`${collection}[${index}]: duplicate id "${record.id}"`, {
        collection,
        index,
        recordId: record.id,
      });
    }
    byId.set(record.id, record);

    if (!nameOf) return;
    const name = nameOf(record);
    const existing = byName.get(name);
    if (existing) {
      throw duplicateRecord(
        `${collection}[${index}] (id "${record.id}"): duplicate name "${name}" (already used by id "${existing.id}")`,
        { collection, index, recordId: record.id }
      );
    }
    byName.set(name, record);
  });
  return nameOf ? byName : byId;
}

export function loadRegistry(input: unknown): Snapshot {
  if (!Value.Check(RegistryExport, input) || Array.isArray(input)) {
    throw malformedRecord("registry export must be an object whose collections are arrays", {
      collection: "registry",
    });
  }

  const skills = validateCollection(Skill, "skills", input.skills).map(withSkillDefaults);
  const modules = validateCollection(Module, "modules", input.modules).map(withModuleDefaults);
  const codeBlocks = validateCollection(CodeBlock, "codeBlocks", input.codeBlocks).map(withCodeBlockDefaults);
  const lessons = validateCollection(Lesson, "lessons", input.lessons).map(withLessonDefaults);
  const moduleDecls = validateCollection(SkillModuleDeclaration, "skillModuleDependencies", input.skillModuleDependencies);
  const skillDecls = validateCollection(SkillSkillDeclaration, "skillSkillDependencies", input.skillSkillDependencies);

  const skillsByName = indexUnique(skills, "skills", (s) => s.name);
  const skillsById = new Map(skills.map((s) => [s.id, s]));
  const modulesByName = indexUnique(modules, "modules", (m) => m.name);
  indexUnique(lessons, "lessons");

  // Code block names are not required to be unique; the first wins.
  indexUnique(codeBlocks, "codeBlocks");
  const codeBlocksByName = new Map<string, LoadedCodeBlock>();
  for (const block of codeBlocks) {
    if (!codeBlocksByName.has(block.name)) codeBlocksByName.set(block.name, block);
  }

  const edgesBySkill = new Map<string, DependencyEdge[]>();
  for (const s of skills) edgesBySkill.set(s.id, []);

  const addDeclarations = (
    decls: readonly SkillModuleDeclaration[],
    collection: RegistryCollection,
    declaredKind: DependencyKind
  ) => {
    decls.forEach((decl, index) => {
      const skill = skillsById.get(decl.skillId);
      const edges = edgesBySkill.get(decl.skillId);
      if (!skill || !edges) {
        throw malformedRecord(`${collection}[${index}]: skillId "${decl.skillId}" does not name a skill`, {
          collection,
          index,
          recordId: decl.skillId,
          path: "/skillId",
        });
      }
      edges.push({
        fromSkillId: skill.id,
        fromSkillName: skill.name,
        targetName: decl.target,
        declaredKind,
        strength: normalizeStrength(decl.strength),
      });
    });
  };
  addDeclarations(moduleDecls, "skillModuleDependencies", "module");
  addDeclarations(skillDecls, "skillSkillDependencies", "skill");

  const frozenEdges = new Map<string, readonly DependencyEdge[]>();
  for (const [id, edges] of edgesBySkill) frozenEdges.set(id, Object.freeze([...edges]));

  return Object.freeze({
    skills: skillsByName,
    skillsById,
    modules: modulesByName,
    codeBlocks: codeBlocksByName,
    lessons: Object.freeze(lessons),
    edgesBySkill: frozenEdges,
    edges: Object.freeze([...frozenEdges.values()].flat()),
  });
}

export function readRegistryFile(path: string): Snapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw malformedRecord(`cannot read registry export ${path}: ${reason}`, { collection: "registry" });
  }
  return loadRegistry(raw);
}
