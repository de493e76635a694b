/**
 * Directed graphs over rule names.
 *
 * Nodes keep insertion order, which for rule graphs is declaration order;
 * every traversal below visits nodes and successors in that order so results
 * are deterministic.
 */

export interface GraphEdge {
  readonly from: string;
  readonly to: string;
}

export interface Graph {
  readonly nodes: ReadonlyArray<string>;
  readonly edges: ReadonlyArray<GraphEdge>;
}

/** Create a directed graph from node IDs and `[from, to]` tuples. Duplicate edges are dropped. */
export function createDigraph(nodes: Iterable<string>, edges: Iterable<[from: string, to: string]>): Graph {
  const nodeSet = new Set(nodes);
  const seen = new Set<string>();
  const edgeList: GraphEdge[] = [];
  for (const [from, to] of edges) {
    nodeSet.add(from);
    nodeSet.add(to);
    const key = `${from}\u0000${to}`;
    if (seen.has(key)) continue;
    seen.add(key);
    edgeList.push({ from, to });
  }
  return { nodes: [...nodeSet], edges: edgeList };
}

/** Build an adjacency list `Map<nodeId, successorIds[]>`. */
export function adjacencyList(graph: Graph): Map<string, string[]> {
  const adj = new Map<string, string[]>();
  for (const n of graph.nodes) adj.set(n, []);
  for (const e of graph.edges) adj.get(e.from)?.push(e.to);
  return adj;
}

export function hasEdge(graph: Graph, from: string, to: string): boolean {
  return graph.edges.some((e) => e.from === from && e.to === to);
}

/** The subgraph on `keep`, with only the edges between kept nodes. */
export function inducedSubgraph(graph: Graph, keep: ReadonlySet<string>): Graph {
  return {
    nodes: graph.nodes.filter((n) => keep.has(n)),
    edges: graph.edges.filter((e) => keep.has(e.from) && keep.has(e.to)),
  };
}

/** Nodes reachable from `start` by one or more edges. */
export function reachable(graph: Graph, start: string): Set<string> {
  const adj = adjacencyList(graph);
  const visited = new Set<string>();
  const stack = [...(adj.get(start) ?? [])];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined || visited.has(node)) continue;
    visited.add(node);
    stack.push(...(adj.get(node) ?? []));
  }
  return visited;
}

/**
 * Tarjan's algorithm for strongly connected components.
 *
 * Components come out in reverse topological order: every component appears
 * after all the components it has edges into.
 */
export function stronglyConnectedComponents(graph: Graph): string[][] {
  const adj = adjacencyList(graph);
  let index = 0;
  const nodeIndex = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const sccs: string[][] = [];

  function strongconnect(v: string): number {
    const vIndex = index++;
    let vLow = vIndex;
    nodeIndex.set(v, vIndex);
    stack.push(v);
    onStack.add(v);

    for (const w of adj.get(v) ?? []) {
      const wIndex = nodeIndex.get(w);
      if (wIndex === undefined) {
        vLow = Math.min(vLow, strongconnect(w));
      } else if (onStack.has(w)) {
        vLow = Math.min(vLow, wIndex);
      }
    }

    if (vLow === vIndex) {
      const scc: string[] = [];
      for (;;) {
        const w = stack.pop();
        if (w === undefined) break;
        onStack.delete(w);
        scc.push(w);
        if (w === v) break;
      }
      sccs.push(scc);
    }
    return vLow;
  }

  for (const n of graph.nodes) {
    if (!nodeIndex.has(n)) strongconnect(n);
  }
  return sccs;
}

/** True if some component has more than one node or a node has a self-edge. */
export function hasCycles(graph: Graph): boolean {
  if (graph.edges.some((e) => e.from === e.to)) return true;
  return stronglyConnectedComponents(graph).some((scc) => scc.length > 1);
}

/** Enumerate elementary cycles (Johnson's algorithm, simplified DFS variant). */
export function detectCycles(graph: Graph): string[][] {
  const adj = adjacencyList(graph);
  const order = new Map(graph.nodes.map((n, i): [string, number] => [n, i]));
  const cycles: string[][] = [];
  const blocked = new Set<string>();
  const blockedMap = new Map<string, Set<string>>();
  const stack: string[] = [];

  function unblock(u: string): void {
    blocked.delete(u);
    const bSet = blockedMap.get(u);
    if (bSet) {
      for (const w of bSet) {
        if (blocked.has(w)) unblock(w);
      }
      bSet.clear();
    }
  }

  function circuit(v: string, start: string): boolean {
    let found = false;
    stack.push(v);
    blocked.add(v);

    const startOrder = order.get(start) ?? 0;
    for (const w of adj.get(v) ?? []) {
      if (w === start) {
        cycles.push([...stack]);
        found = true;
      } else if (!blocked.has(w) && (order.get(w) ?? 0) >= startOrder) {
        if (circuit(w, start)) found = true;
      }
    }

    if (found) {
      unblock(v);
    } else {
      for (const w of adj.get(v) ?? []) {
        const bSet = blockedMap.get(w) ?? new Set<string>();
        bSet.add(v);
        blockedMap.set(w, bSet);
      }
    }
    stack.pop();
    return found;
  }

  for (const startNode of graph.nodes) {
    blocked.clear();
    blockedMap.clear();
    circuit(startNode, startNode);
  }
  return cycles;
}
