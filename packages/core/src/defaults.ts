import type { AppConfig } from "@perfscope/contracts";

export const DEFAULT_CONFIG: AppConfig = {
  server: {
    host: "127.0.0.1",
    port: 5210,
    logLevel: "info",
  },
  analysis: {
    hotPathMaxDepth: 30,
    callTreeDepth: 3,
    timelineBuckets: 100,
    timelineLanes: ["gc", "cpu", "exceptions"],
    snapshotWindowMs: 100,
    flatTop: 20,
    largeObjectThresholdBytes: 85_000,
  },
  discovery: {
    roots: ["~/.perfscope/traces"],
    includeGlobs: ["**/*.trace.jsonl", "**/*.trace.json"],
    excludeGlobs: ["**/node_modules/**"],
    maxDepth: 6,
  },
};
