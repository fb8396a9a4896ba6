import type { StackSample } from "@perfscope/contracts";

export const ROOT_NODE_NAME = "ROOT";

export interface CallTreeNode {
  name: string;
  inclusiveMetric: number;
  exclusiveMetric: number;
  inclusiveCount: number;
  /** Index of the parent node, -1 for the root. */
  parent: number;
  children: number[];
}

/**
 * Arena of call-tree nodes. Node 0 is the root covering every inserted
 * sample. Pseudo frames are kept as ordinary nodes; navigation folds them.
 */
export class CallTree {
  readonly nodes: CallTreeNode[] = [];
  private readonly childLookup: Array<Map<string, number>> = [];

  constructor() {
    this.createNode(ROOT_NODE_NAME, -1);
  }

  get root(): CallTreeNode {
    return this.node(0);
  }

  get percentageBasis(): number {
    return this.root.inclusiveMetric;
  }

  node(index: number): CallTreeNode {
    const node = this.nodes[index];
    if (!node) {
      throw new Error(`call tree node out of range: ${index}`);
    }
    return node;
  }

  addSample(sample: StackSample): void {
    const metric = sample.metric;
    let current = 0;
    this.charge(current, metric);
    for (let i = sample.frames.length - 1; i >= 0; i -= 1) {
      current = this.childOf(current, sample.frames[i] ?? "");
      this.charge(current, metric);
    }
    this.node(current).exclusiveMetric += metric;
  }

  private charge(index: number, metric: number): void {
    const node = this.node(index);
    node.inclusiveMetric += metric;
    node.inclusiveCount += 1;
  }

  private childOf(parent: number, name: string): number {
    const lookup = this.childLookup[parent];
    const existing = lookup?.get(name);
    if (existing !== undefined) return existing;
    const index = this.createNode(name, parent);
    lookup?.set(name, index);
    this.node(parent).children.push(index);
    return index;
  }

  private createNode(name: string, parent: number): number {
    const index = this.nodes.length;
    this.nodes.push({ name, inclusiveMetric: 0, exclusiveMetric: 0, inclusiveCount: 0, parent, children: [] });
    this.childLookup.push(new Map());
    return index;
  }
}

export function buildCallTree(samples: Iterable<StackSample>): CallTree {
  const tree = new CallTree();
  for (const sample of samples) {
    tree.addSample(sample);
  }
  return tree;
}
