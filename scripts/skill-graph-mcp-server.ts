/**
 * Skill Graph MCP Server (HTTP)
 *
 * Serves the dependency-graph health analysis of a registry export over
 * REST and MCP (Streamable HTTP on /mcp). The registry is read once at
 * startup and re-analyzed on demand via the reload tool or POST /api/reload.
 *
 *   SKILL_GRAPH_REGISTRY=registry.json PORT=3100 npx tsx scripts/skill-graph-mcp-server.ts
 *
 * SKILL_GRAPH_POLICY optionally names a policy file; an invalid one stops startup.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { randomUUID } from "node:crypto";
import { resolve } from "node:path";
import express from "express";
import cors from "cors";

import type { LoadFailure } from "../src/registry/index.js";
import { DEFAULT_PORT, policyFromEnv, resolveRegistryPath } from "./skill-graph/config.js";
import { RegistryLoadError } from "./skill-graph/errors.js";
import { readRegistryFile } from "./skill-graph/loader.js";
import { runAnalysis, type AnalysisRun } from "./skill-graph/pipeline.js";
import { moduleDetail, orphanView, recommendationView, resolveReference, summaryView } from "./skill-graph/queries.js";
import { renderText } from "./skill-graph/report.js";

const REGISTRY_PATH = resolve(resolveRegistryPath());
const POLICY = policyFromEnv();

// --- Analysis state ---
let current: AnalysisRun | null = null;
let loadFailure: LoadFailure | null = null;

async function reload(): Promise<void> {
  try {
    const snapshot = readRegistryFile(REGISTRY_PATH);
    console.log(`[skill-graph-mcp] Loaded registry from ${REGISTRY_PATH}`);
    current = await runAnalysis(snapshot, { policy: POLICY });
    loadFailure = null;
    const s = current.report.summary;
    console.log(`[skill-graph-mcp] Analysis complete: ${s.totalSkills} skills, ${s.totalModules} modules, ${s.missingReferenceCount} missing, ${s.orphanCount} orphans`);
  } catch (e) {
    if (!(e instanceof RegistryLoadError)) throw e;
    loadFailure = e.toFailure();
    current = null;
    console.error(`[skill-graph-mcp] FATAL ${e.code}: ${e.message}`);
  }
}

function json(payload: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }] };
}

function unavailable() {
  return json({ error: "Analysis unavailable", failure: loadFailure });
}

// --- Register MCP tools on a server instance ---
function registerTools(server: McpServer): void {
  server.tool(
    "skill_graph_summary",
    "Summary counters of the latest run: skills, modules, orphans, missing references, warnings, and the most-used modules.",
    {},
    async () => (current ? json(summaryView(current)) : unavailable())
  );

  server.tool(
    "skill_graph_resolve",
    "Resolve a dependency name against the registry the way the consistency checker does. Suggests a close name when missing.",
    {
      name: z.string().min(1).describe("Target name, exact and case-sensitive"),
      declaredKind: z.enum(["module", "skill"]).optional().describe("Kind the reference is declared as (default: module)"),
    },
    async ({ name, declaredKind }) =>
      current ? json(resolveReference(current, name, declaredKind ?? "module")) : unavailable()
  );

  server.tool(
    "skill_graph_module",
    "Health, usage, lessons and wiring suggestion for one module.",
    { name: z.string().min(1).describe("Module name") },
    async ({ name }) => (current ? json(moduleDetail(current, name)) : unavailable())
  );

  server.tool(
    "skill_graph_orphans",
    "Modules no skill depends on, grouped by category with their health scores.",
    { category: z.string().optional().describe("Only this category") },
    async ({ category }) => (current ? json(orphanView(current, category)) : unavailable())
  );

  server.tool(
    "skill_graph_recommendations",
    "Proposed new skills for orphan clusters, wiring targets for remaining orphans, and did-you-mean hints for missing references.",
    {},
    async () => (current ? json(recommendationView(current)) : unavailable())
  );

  server.tool(
    "skill_graph_reload",
    "Re-read the registry export and re-run the analysis.",
    {},
    async () => {
      await reload();
      return current ? json(summaryView(current)) : unavailable();
    }
  );
}

function createMcpServer(): McpServer {
  const server = new McpServer({ name: "skill-graph-health", version: "1.0.0" });
  registerTools(server);
  return server;
}

// --- HTTP Server ---
const app = express();
app.use(cors());
app.use(express.json());

app.get("/health", (_req, res) => {
  res.json({
    status: current ? "ok" : "error",
    service: "skill-graph-mcp-server",
    registry: REGISTRY_PATH,
    summary: current?.report.summary ?? null,
    failure: loadFailure,
  });
});

app.get("/api/analysis", (_req, res) => {
  if (!current) {
    res.status(503).json({ error: "Analysis unavailable", failure: loadFailure });
    return;
  }
  res.json(current.report);
});

app.get("/api/report.md", (_req, res) => {
  if (!current) {
    res.status(503).json({ error: "Analysis unavailable", failure: loadFailure });
    return;
  }
  res.type("text/markdown").send(renderText(current.report));
});

app.get("/api/modules/:name", (req, res) => {
  if (!current) {
    res.status(503).json({ error: "Analysis unavailable", failure: loadFailure });
    return;
  }
  const view = moduleDetail(current, req.params.name);
  res.status("error" in view ? 404 : 200).json(view);
});

app.post("/api/reload", async (_req, res) => {
  try {
    await reload();
    res.status(current ? 200 : 422).json(current ? current.report.summary : { error: "Load failed", failure: loadFailure });
  } catch (e) {
    console.error("[skill-graph-mcp] Reload error:", e);
    res.status(500).json({ error: "Reload failed", message: e instanceof Error ? e.message : String(e) });
  }
});

const transports: Record<string, StreamableHTTPServerTransport> = {};

app.all("/mcp", async (req, res) => {
  const sessionId = req.headers["mcp-session-id"];
  let transport: StreamableHTTPServerTransport;

  if (typeof sessionId === "string" && transports[sessionId]) {
    transport = transports[sessionId];
  } else if (sessionId === undefined && req.method === "POST" && isInitializeRequest(req.body)) {
    transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid) => {
        console.log(`[skill-graph-mcp] StreamableHTTP session: ${sid}`);
        transports[sid] = transport;
      },
    });
    transport.onclose = () => {
      const sid = transport.sessionId;
      if (sid && transports[sid]) delete transports[sid];
    };
    await createMcpServer().connect(transport);
  } else {
    res.status(400).json({ jsonrpc: "2.0", error: { code: -32000, message: "No valid session" }, id: null });
    return;
  }

  await transport.handleRequest(req, res, req.body);
});

// --- Start ---
const PORT = parseInt(process.env.PORT || String(DEFAULT_PORT), 10);

await reload();

const httpServer = app.listen(PORT, () => {
  console.log(`[skill-graph-mcp] HTTP server listening on port ${PORT}`);
  console.log(`[skill-graph-mcp] Health:   http://localhost:${PORT}/health`);
  console.log(`[skill-graph-mcp] Report:   http://localhost:${PORT}/api/report.md`);
  console.log(`[skill-graph-mcp] MCP:      http://localhost:${PORT}/mcp`);
});

process.on("SIGINT", async () => {
  for (const sid in transports) {
    try {
      await transports[sid].close();
    } catch (e) {
      console.warn(`[skill-graph-mcp] Failed to close session ${sid}:`, e);
    }
    delete transports[sid];
  }
  httpServer.close(() => process.exit(0));
});
