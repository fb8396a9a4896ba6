import type { CallTreeNodeDto, CallTreeResponse, CallerCalleeResponse } from "@perfscope/contracts";
import type { CallTree, CallTreeNode } from "./callTree.js";
import { isPseudoFrame } from "./frames.js";
import { containsIgnoreCase, round } from "./utils.js";

export const DEFAULT_HOT_PATH_MAX_DEPTH = 30;
export const HOT_PATH_THRESHOLD = 0.8;

/**
 * Children of `index` with pseudo-frame children replaced by their own real
 * descendants, in depth-first encounter order.
 */
export function realChildren(tree: CallTree, index: number): number[] {
  const result: number[] = [];
  const pending = [...tree.node(index).children].reverse();
  while (pending.length > 0) {
    const childIndex = pending.pop();
    if (childIndex === undefined) break;
    const child = tree.node(childIndex);
    if (isPseudoFrame(child.name)) {
      for (let i = child.children.length - 1; i >= 0; i -= 1) {
        const grandchild = child.children[i];
        if (grandchild !== undefined) pending.push(grandchild);
      }
      continue;
    }
    result.push(childIndex);
  }
  return result;
}

export function sortedRealChildren(tree: CallTree, index: number): number[] {
  return realChildren(tree, index).sort(
    (a, b) => Math.abs(tree.node(b).inclusiveMetric) - Math.abs(tree.node(a).inclusiveMetric),
  );
}

function percentOf(value: number, basis: number): number {
  return basis > 0 ? round((value * 100) / basis, 2) : 0;
}

function toDto(node: CallTreeNode, percentBasis: number, childCount: number): CallTreeNodeDto {
  return {
    name: node.name,
    inclusiveMs: round(node.inclusiveMetric, 2),
    exclusiveMs: round(node.exclusiveMetric, 2),
    inclusivePercent: percentOf(node.inclusiveMetric, percentBasis),
    exclusivePercent: percentOf(node.exclusiveMetric, percentBasis),
    childCount,
  };
}

export function serializeNode(
  tree: CallTree,
  index: number,
  percentBasis: number,
  depth: number,
  maxDepth: number,
): CallTreeNodeDto {
  const children = realChildren(tree, index);
  const dto = toDto(tree.node(index), percentBasis, children.length);
  if (depth < maxDepth && children.length > 0) {
    dto.children = sortedRealChildren(tree, index).map((child) =>
      serializeNode(tree, child, percentBasis, depth + 1, maxDepth),
    );
  }
  return dto;
}

function emptyResponse(): CallTreeResponse {
  return { totalMetricMs: 0, totalSamples: 0, nodes: [] };
}

function responseFor(tree: CallTree, nodes: CallTreeNodeDto[]): CallTreeResponse {
  return {
    totalMetricMs: round(tree.root.inclusiveMetric, 2),
    totalSamples: tree.root.inclusiveCount,
    nodes,
  };
}

/** Resolves a path of indexes into sorted real children; null when any step is out of range. */
export function nodeAtPath(tree: CallTree, path: readonly number[]): number | null {
  let current = 0;
  for (const step of path) {
    const children = sortedRealChildren(tree, current);
    if (!Number.isInteger(step) || step < 0 || step >= children.length) return null;
    const next = children[step];
    if (next === undefined) return null;
    current = next;
  }
  return current;
}

export function getCallTree(tree: CallTree, depth: number): CallTreeResponse {
  return getCallTreeChildren(tree, [], depth);
}

export function getCallTreeChildren(tree: CallTree, path: readonly number[], depth: number): CallTreeResponse {
  const start = nodeAtPath(tree, path);
  if (start === null) return emptyResponse();
  const nodes = sortedRealChildren(tree, start).map((child) =>
    serializeNode(tree, child, tree.percentageBasis, 1, depth),
  );
  return responseFor(tree, nodes);
}

export interface HotPathOptions {
  maxDepth?: number;
}

function hotPathChildren(tree: CallTree, index: number, depth: number, maxDepth: number): CallTreeNodeDto[] {
  const sorted = sortedRealChildren(tree, index);
  const top = sorted[0];
  if (top === undefined) return [];

  const nodeInclusive = Math.abs(tree.node(index).inclusiveMetric);
  const continues =
    depth < maxDepth &&
    nodeInclusive > 0 &&
    Math.abs(tree.node(top).inclusiveMetric) >= nodeInclusive * HOT_PATH_THRESHOLD;

  return sorted.map((child, position) => {
    const dto = toDto(tree.node(child), tree.percentageBasis, realChildren(tree, child).length);
    if (position === 0 && continues) {
      dto.children = hotPathChildren(tree, child, depth + 1, maxDepth);
    }
    return dto;
  });
}

/**
 * Lists every real child at each level and expands only the heaviest one,
 * as long as it carries at least 80% of its parent.
 */
export function getHotPath(tree: CallTree, path: readonly number[], options: HotPathOptions = {}): CallTreeResponse {
  const start = nodeAtPath(tree, path);
  if (start === null) return emptyResponse();
  const maxDepth = options.maxDepth ?? DEFAULT_HOT_PATH_MAX_DEPTH;
  return responseFor(tree, hotPathChildren(tree, start, 0, maxDepth));
}

interface Accumulator {
  inclusive: number;
  exclusive: number;
}

function hasAncestorNamed(tree: CallTree, index: number, name: string): boolean {
  let parent = tree.node(index).parent;
  while (parent > 0) {
    const node = tree.node(parent);
    if (node.name === name) return true;
    parent = node.parent;
  }
  return false;
}

function nearestRealAncestor(tree: CallTree, index: number): number | null {
  let parent = tree.node(index).parent;
  while (parent > 0) {
    if (!isPseudoFrame(tree.node(parent).name)) return parent;
    parent = tree.node(parent).parent;
  }
  return null;
}

function addTo(groups: Map<string, Accumulator>, name: string, inclusive: number, exclusive: number): void {
  const entry = groups.get(name) ?? { inclusive: 0, exclusive: 0 };
  entry.inclusive += inclusive;
  entry.exclusive += exclusive;
  groups.set(name, entry);
}

interface CallerCalleeView {
  name: string;
  focus: Accumulator;
  callers: Map<string, Accumulator>;
  callees: Map<string, Accumulator>;
}

function collectCallerCallee(tree: CallTree, name: string): CallerCalleeView {
  const focus: Accumulator = { inclusive: 0, exclusive: 0 };
  const callers = new Map<string, Accumulator>();
  const callees = new Map<string, Accumulator>();

  tree.nodes.forEach((node, index) => {
    if (index === 0 || node.name !== name) return;
    focus.exclusive += node.exclusiveMetric;
    // nested instances are recursion and were already counted by the outer one
    if (hasAncestorNamed(tree, index, name)) return;
    focus.inclusive += node.inclusiveMetric;

    const caller = nearestRealAncestor(tree, index);
    if (caller !== null) {
      addTo(callers, tree.node(caller).name, node.inclusiveMetric, node.exclusiveMetric);
    }
    for (const child of realChildren(tree, index)) {
      const callee = tree.node(child);
      addTo(callees, callee.name, callee.inclusiveMetric, callee.exclusiveMetric);
    }
  });

  return { name, focus, callers, callees };
}

function bestSubstringMatch(tree: CallTree, query: string): string | null {
  let best: CallTreeNode | null = null;
  for (let index = 1; index < tree.nodes.length; index += 1) {
    const node = tree.node(index);
    if (isPseudoFrame(node.name) || !containsIgnoreCase(node.name, query)) continue;
    if (!best || Math.abs(node.inclusiveMetric) > Math.abs(best.inclusiveMetric)) best = node;
  }
  return best ? best.name : null;
}

function groupDtos(groups: Map<string, Accumulator>, percentBasis: number): CallTreeNodeDto[] {
  return Array.from(groups.entries())
    .sort(([, a], [, b]) => Math.abs(b.inclusive) - Math.abs(a.inclusive))
    .map(([name, totals]) => ({
      name,
      inclusiveMs: round(totals.inclusive, 2),
      exclusiveMs: round(totals.exclusive, 2),
      inclusivePercent: percentOf(totals.inclusive, percentBasis),
      exclusivePercent: percentOf(totals.exclusive, percentBasis),
      childCount: 0,
    }));
}

/**
 * Callers and callees of a method. An exact name is tried first; when it
 * matches nothing the heaviest real frame containing the query is used.
 */
export function getCallerCallee(tree: CallTree, method: string): CallerCalleeResponse {
  let view = collectCallerCallee(tree, method);
  if (view.focus.inclusive === 0 && view.callers.size === 0 && view.callees.size === 0) {
    const fallback = bestSubstringMatch(tree, method);
    if (fallback !== null) view = collectCallerCallee(tree, fallback);
  }

  const basis = tree.percentageBasis;
  return {
    focus: {
      name: view.name,
      inclusiveMs: round(view.focus.inclusive, 2),
      exclusiveMs: round(view.focus.exclusive, 2),
      inclusivePercent: percentOf(view.focus.inclusive, basis),
      exclusivePercent: percentOf(view.focus.exclusive, basis),
      childCount: 0,
    },
    callers: groupDtos(view.callers, basis),
    callees: groupDtos(view.callees, basis),
  };
}
