import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { DiscoveredTraceFile, DiscoveryConfig } from "@perfscope/contracts";
import { expandHome, stableId } from "./utils.js";

export type TraceFormat = "jsonl" | "json" | "unknown";

export function formatFromPath(filePath: string): TraceFormat {
  const lowered = filePath.toLowerCase();
  if (lowered.endsWith(".jsonl")) return "jsonl";
  if (lowered.endsWith(".json")) return "json";
  return "unknown";
}

export async function describeTraceFile(filePath: string): Promise<DiscoveredTraceFile | null> {
  const resolved = path.resolve(expandHome(filePath));
  const fileStat = await stat(resolved).catch(() => null);
  if (!fileStat || !fileStat.isFile()) return null;
  return {
    id: stableId([resolved, String(fileStat.dev), String(fileStat.ino)]),
    path: resolved,
    format: formatFromPath(resolved),
    sizeBytes: fileStat.size,
    mtimeMs: fileStat.mtimeMs,
  };
}

/** Trace files under every configured root, newest first. */
export async function discoverTraceFiles(config: DiscoveryConfig): Promise<DiscoveredTraceFile[]> {
  const dedup = new Map<string, DiscoveredTraceFile>();
  for (const rootRaw of config.roots) {
    const root = expandHome(rootRaw);
    const matches = await fg(config.includeGlobs, {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      dot: true,
      deep: config.maxDepth,
      suppressErrors: true,
      ignore: config.excludeGlobs,
      unique: true,
      followSymbolicLinks: false,
    });

    for (const filePath of matches) {
      // a file can vanish between the glob and the stat
      const file = await describeTraceFile(filePath);
      if (file && !dedup.has(file.id)) dedup.set(file.id, file);
    }
  }

  const all = Array.from(dedup.values());
  all.sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path));
  return all;
}
