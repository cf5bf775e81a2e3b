import type { NetworkDataset, NeuralConnection, NeuralNode, NeuronId } from '../types';

export type DatasetIssue =
  | { kind: 'duplicate-node-id'; nodeId: NeuronId }
  | { kind: 'position-out-of-range'; nodeId: NeuronId }
  | { kind: 'duplicate-connection-id'; connectionId: string }
  | { kind: 'dangling-connection'; connectionId: string; missing: NeuronId[] };

/**
 * Build an immutable dataset from caller-owned arrays.
 * Inputs are copied, so later mutation of the arrays passed in does not leak through.
 */
export function createDataset(
  nodes: readonly NeuralNode[],
  connections: readonly NeuralConnection[],
): NetworkDataset {
  const frozenNodes = nodes.map((n) =>
    Object.freeze({ id: n.id, label: n.label, position: Object.freeze({ x: n.position.x, y: n.position.y }) }),
  );
  const frozenConnections = connections.map((c) =>
    Object.freeze({ id: c.id, source: c.source, target: c.target }),
  );
  return Object.freeze({
    nodes: Object.freeze(frozenNodes),
    connections: Object.freeze(frozenConnections),
  });
}

/** Lookup by id. On duplicate ids the first node wins. */
export function indexNodes(nodes: readonly NeuralNode[]): ReadonlyMap<NeuronId, NeuralNode> {
  const index = new Map<NeuronId, NeuralNode>();
  for (const n of nodes) {
    if (!index.has(n.id)) index.set(n.id, n);
  }
  return index;
}

export function resolveConnection(
  index: ReadonlyMap<NeuronId, NeuralNode>,
  connection: NeuralConnection,
): [NeuralNode, NeuralNode] | null {
  const source = index.get(connection.source);
  const target = index.get(connection.target);
  if (!source || !target) return null;
  return [source, target];
}

/**
 * Undirected connected components over resolvable connections.
 * Each component is sorted ascending; components are ordered by their smallest id.
 */
export function connectedComponents(dataset: NetworkDataset): NeuronId[][] {
  const index = indexNodes(dataset.nodes);
  const adjacency = new Map<NeuronId, NeuronId[]>();
  for (const id of index.keys()) adjacency.set(id, []);
  for (const c of dataset.connections) {
    if (!resolveConnection(index, c)) continue;
    adjacency.get(c.source)?.push(c.target);
    adjacency.get(c.target)?.push(c.source);
  }

  const visited = new Set<NeuronId>();
  const components: NeuronId[][] = [];
  for (const start of index.keys()) {
    if (visited.has(start)) continue;
    const component: NeuronId[] = [];
    const stack: NeuronId[] = [start];
    visited.add(start);
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      component.push(id);
      for (const next of adjacency.get(id) ?? []) {
        if (visited.has(next)) continue;
        visited.add(next);
        stack.push(next);
      }
    }
    components.push(component.sort((a, b) => a - b));
  }
  return components.sort((a, b) => (a[0] ?? 0) - (b[0] ?? 0));
}

export function isConnected(dataset: NetworkDataset): boolean {
  return connectedComponents(dataset).length <= 1;
}

/**
 * Keep every node and only the connections whose endpoints are on the same side.
 * Connections with an unresolvable endpoint are kept as-is; drawing skips them anyway.
 */
export function severConnections(
  dataset: NetworkDataset,
  sameSide: (a: NeuralNode, b: NeuralNode) => boolean,
): NetworkDataset {
  const index = indexNodes(dataset.nodes);
  const kept = dataset.connections.filter((c) => {
    const pair = resolveConnection(index, c);
    return pair === null || sameSide(pair[0], pair[1]);
  });
  return createDataset(dataset.nodes, kept);
}

function inUnitRange(v: number): boolean {
  return Number.isFinite(v) && v >= 0 && v <= 1;
}

/** Diagnostics for curated data. Rendering never depends on this. */
export function inspectDataset(dataset: NetworkDataset): DatasetIssue[] {
  const issues: DatasetIssue[] = [];
  const seenNodes = new Set<NeuronId>();
  for (const n of dataset.nodes) {
    if (seenNodes.has(n.id)) issues.push({ kind: 'duplicate-node-id', nodeId: n.id });
    seenNodes.add(n.id);
    if (!inUnitRange(n.position.x) || !inUnitRange(n.position.y)) {
      issues.push({ kind: 'position-out-of-range', nodeId: n.id });
    }
  }
  const seenConnections = new Set<string>();
  for (const c of dataset.connections) {
    if (seenConnections.has(c.id)) issues.push({ kind: 'duplicate-connection-id', connectionId: c.id });
    seenConnections.add(c.id);
    const missing = [c.source, c.target].filter((id) => !seenNodes.has(id));
    if (missing.length > 0) issues.push({ kind: 'dangling-connection', connectionId: c.id, missing });
  }
  return issues;
}
