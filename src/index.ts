import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CheckpointManager } from "@/checkpoint";
import { createOracle } from "@/oracle";
import { DreamGroupSession } from "@/session";
import {
  buildIndex,
  FindSimilarInputSchema,
  findSimilarClusters,
  getRunStatus,
  ListClustersInputSchema,
  listClusters,
  MergeClustersInputSchema,
  mergeClusterGroups,
  RunPipelineInputSchema,
  runPipeline,
} from "@/tools/groups";
import { createVectorStore, openExistingVectorStore } from "@/vectors";
import {
  getCheckpointPath,
  getDbPath,
  getProjectPath,
  loadConfig,
} from "./config";
import { SQLiteDatabase } from "./database/sqlite";
import {
  CachedEmbeddingClient,
  createEmbeddingClient,
} from "./embeddings/provider";

// Initialize services
const config = loadConfig();
const projectPath = getProjectPath();
const db = new SQLiteDatabase(getDbPath(config, projectPath));

const oracle = createOracle(config.oracle);
if (!oracle) {
  console.warn(
    "[dreamgroup] No ANTHROPIC_API_KEY configured; using deterministic fallbacks",
  );
}

// Create embedding client with caching layer
const baseEmbeddings = createEmbeddingClient(config.embedding);
const modelName =
  config.embedding.provider === "local" ? "local-tei" : config.embedding.model;
const embeddings = new CachedEmbeddingClient(baseEmbeddings, db, modelName);

const vectors = openExistingVectorStore(config.vector, projectPath);
if (!vectors) {
  console.warn(
    "[dreamgroup] Similarity index not built; search serves the lexical tier only",
  );
}

const session = new DreamGroupSession({
  config,
  checkpoint: new CheckpointManager(getCheckpointPath(config, projectPath)),
  db,
  oracle,
  embeddings,
  vectors,
  createVectors: () => createVectorStore(config.vector, projectPath),
});

function jsonResult(value: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

// Create MCP server
const server = new McpServer({
  name: "dreamgroup-mcp",
  version: "0.1.0",
});

server.registerTool(
  "dreamgroup_run",
  {
    title: "Run Grouping Pipeline",
    description:
      "Normalize, cluster and classify a corpus of goal posts in the background. Resumes from the last checkpoint unless fresh is set.",
    inputSchema: RunPipelineInputSchema.shape,
  },
  async (args) => jsonResult(runPipeline(args, session, projectPath)),
);

server.registerTool(
  "dreamgroup_status",
  {
    title: "Pipeline Status",
    description:
      "Current stage, progress counters and last error of the pipeline run",
    inputSchema: {},
  },
  async () => jsonResult(getRunStatus(session)),
);

server.registerTool(
  "dreamgroup_clusters",
  {
    title: "List Clusters",
    description:
      "Summary of the last finished run: largest clusters, category distribution and optional age-band breakdown",
    inputSchema: ListClustersInputSchema.shape,
  },
  async (args) => {
    const result = listClusters(args, session);
    return jsonResult(result ?? { message: "No finished run yet" });
  },
);

server.registerTool(
  "dreamgroup_similar",
  {
    title: "Find Similar Clusters",
    description:
      "Suggest clusters that resemble the given cluster, as candidates for a manual merge",
    inputSchema: FindSimilarInputSchema.shape,
  },
  async (args) => jsonResult(await findSimilarClusters(args, session)),
);

server.registerTool(
  "dreamgroup_merge",
  {
    title: "Merge Clusters",
    description:
      "Fold one or more clusters into a target cluster after review",
    inputSchema: MergeClustersInputSchema.shape,
  },
  async (args) => jsonResult(mergeClusterGroups(args, session)),
);

server.registerTool(
  "dreamgroup_build_index",
  {
    title: "Build Similarity Index",
    description:
      "Embed every distinct normalized phrase and store it for vector similarity search",
    inputSchema: {},
  },
  async () => jsonResult(await buildIndex(session)),
);

// Start server
const transport = new StdioServerTransport();
await server.connect(transport);

console.error("[dreamgroup] MCP server started");
