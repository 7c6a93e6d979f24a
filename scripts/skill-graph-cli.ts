#!/usr/bin/env node
/**
 * Skill Graph CLI
 *
 * Loads a registry export, runs the dependency-graph consistency and health
 * analysis, and writes the report.
 *
 *   npx tsx scripts/skill-graph-cli.ts registry.json
 *   npx tsx scripts/skill-graph-cli.ts registry.json --format=structured --out arch/skill-graph.json
 *   npx tsx scripts/skill-graph-cli.ts registry.json --min-cluster-size=3 --fail-on-missing
 *
 * Exit codes: 0 completed, 1 fatal load error or bad usage,
 * 2 --fail-on-missing and at least one missing reference.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { ReportFormat } from "../src/analysis/index.js";
import { DEFAULT_POLICY, readPolicyFile, resolveRegistryPath } from "./skill-graph/config.js";
import { RegistryLoadError } from "./skill-graph/errors.js";
import { readRegistryFile } from "./skill-graph/loader.js";
import { runAnalysis } from "./skill-graph/pipeline.js";
import { renderReport } from "./skill-graph/report.js";
import type { Snapshot } from "./skill-graph/types.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_MISSING = 2;

export interface CliOptions {
  registryPath: string;
  outPath?: string;
  format: ReportFormat;
  minClusterSize?: number;
  failOnMissing: boolean;
  policyPath?: string;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => console.error(text),
};

const VALUE_FLAGS = new Set(["--out", "--format", "--min-cluster-size", "--policy"]);
const BOOLEAN_FLAGS = new Set(["--fail-on-missing"]);

export function parseArgs(args: string[]): CliOptions {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    if (BOOLEAN_FLAGS.has(flag)) {
      flags.add(flag);
    } else if (VALUE_FLAGS.has(flag)) {
      const value = eq >= 0 ? arg.slice(eq + 1) : args[++i];
      if (value === undefined || value === "") throw new Error(`${flag} requires a value`);
      values.set(flag, value);
    } else {
      throw new Error(`Unknown option ${flag}`);
    }
  }

  if (positional.length > 1) throw new Error(`Expected one registry path, got ${positional.length}`);

  const format = values.get("--format") ?? "text";
  if (format !== "text" && format !== "structured") {
    throw new Error(`--format must be "text" or "structured", got "${format}"`);
  }

  let minClusterSize: number | undefined;
  const rawSize = values.get("--min-cluster-size");
  if (rawSize !== undefined) {
    minClusterSize = Number(rawSize);
    if (!Number.isInteger(minClusterSize) || minClusterSize < 2) {
      throw new Error(`--min-cluster-size must be an integer >= 2, got "${rawSize}"`);
    }
  }

  return {
    registryPath: resolveRegistryPath(positional[0]),
    outPath: values.get("--out"),
    format,
    minClusterSize,
    failOnMissing: flags.has("--fail-on-missing"),
    policyPath: values.get("--policy"),
  };
}

export async function runCli(args: string[], io: CliIO = defaultIO): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (e) {
    io.stderr(`[skill-graph] ${e instanceof Error ? e.message : String(e)}`);
    io.stderr("Usage: skill-graph <registry.json> [--out <file>] [--format=text|structured] [--min-cluster-size=N] [--fail-on-missing] [--policy <file>]");
    return EXIT_FATAL;
  }

  let policy = DEFAULT_POLICY;
  try {
    if (options.policyPath) policy = readPolicyFile(options.policyPath);
  } catch (e) {
    io.stderr(`[skill-graph] ${e instanceof Error ? e.message : String(e)}`);
    return EXIT_FATAL;
  }
  if (options.minClusterSize !== undefined) policy = { ...policy, minClusterSize: options.minClusterSize };

  const registryPath = resolve(options.registryPath);
  let snapshot: Snapshot;
  try {
    snapshot = readRegistryFile(registryPath);
  } catch (e) {
    if (e instanceof RegistryLoadError) {
      io.stderr(`[skill-graph] FATAL ${e.code}: ${e.message}`);
      return EXIT_FATAL;
    }
    throw e;
  }
  io.stderr(
    `[skill-graph] Loaded ${snapshot.skills.size} skills, ${snapshot.modules.size} modules, ${snapshot.codeBlocks.size} code blocks, ${snapshot.lessons.length} lessons from ${registryPath}`
  );

  const run = await runAnalysis(snapshot, { policy });
  const s = run.report.summary;
  io.stderr(
    `[skill-graph] Analysis complete: ${s.totalEdges} edges, ${s.missingReferenceCount} missing, ${s.warningCount} warnings, ${s.orphanCount} orphans`
  );

  const output = renderReport(run.report, options.format);
  if (options.outPath) {
    const outPath = resolve(options.outPath);
    mkdirSync(dirname(outPath), { recursive: true });
    writeFileSync(outPath, output);
    io.stderr(`[skill-graph] Report written to ${outPath}`);
  } else {
    io.stdout(output);
  }

  if (options.failOnMissing && s.missingReferenceCount > 0) {
    io.stderr(`[skill-graph] ${s.missingReferenceCount} missing reference(s) with --fail-on-missing`);
    return EXIT_MISSING;
  }
  return EXIT_OK;
}

if (process.argv[1] && import.meta.url === pathToFileURL(resolve(process.argv[1])).href) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error("[skill-graph] Unexpected failure:", e);
      process.exitCode = EXIT_FATAL;
    }
  );
}
