import type { NetworkDataset, NeuronId } from '../types';
import { indexNodes, resolveConnection } from './graph';
import { normalizeSize, projectPoint, resolveSurfaceScale } from './geometry';
import type { Size, SurfaceAlign, SurfaceFit } from './geometry';

export type GraphStyle = {
  color: string;
  /** Disk radius in surface units. Uniform for every node. */
  nodeRadius: number;
  edgeWidth: number;
  /** Relative to nodes, which are drawn fully opaque. */
  edgeOpacity: number;
  fit: SurfaceFit;
  align: SurfaceAlign;
};

export const DEFAULT_GRAPH_STYLE: Omit<GraphStyle, 'color'> = {
  nodeRadius: 10,
  edgeWidth: 1.5,
  edgeOpacity: 0.5,
  fit: 'square',
  align: 'start',
};

export type EdgeSegment = {
  kind: 'edge';
  key: string;
  connectionId: string;
  source: NeuronId;
  target: NeuronId;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
};

export type NodeDisk = {
  kind: 'node';
  key: string;
  nodeId: NeuronId;
  label: string;
  cx: number;
  cy: number;
  r: number;
};

export type DrawItem = EdgeSegment | NodeDisk;

export type NetworkLayout = {
  width: number;
  height: number;
  color: string;
  nodeOpacity: number;
  edgeOpacity: number;
  edgeWidth: number;
  edges: EdgeSegment[];
  nodes: NodeDisk[];
  /** Paint order: every edge, then every node. */
  items: DrawItem[];
};

const NODE_OPACITY = 1;
// Keeps edges strictly fainter than nodes whatever the caller asks for.
const MAX_EDGE_OPACITY = 0.9;

function clampEdgeOpacity(v: number): number {
  if (!Number.isFinite(v) || v < 0) return 0;
  return Math.min(v, MAX_EDGE_OPACITY);
}

/**
 * Turn a dataset into draw commands for a surface of the given size.
 * Connections with an endpoint missing from the node set produce nothing.
 */
export function layoutNetwork(
  dataset: NetworkDataset,
  surface: Size,
  style: Partial<GraphStyle> & Pick<GraphStyle, 'color'>,
): NetworkLayout {
  // explicit undefined falls back to the default, same as an absent key
  const s: GraphStyle = {
    color: style.color,
    nodeRadius: style.nodeRadius ?? DEFAULT_GRAPH_STYLE.nodeRadius,
    edgeWidth: style.edgeWidth ?? DEFAULT_GRAPH_STYLE.edgeWidth,
    edgeOpacity: style.edgeOpacity ?? DEFAULT_GRAPH_STYLE.edgeOpacity,
    fit: style.fit ?? DEFAULT_GRAPH_STYLE.fit,
    align: style.align ?? DEFAULT_GRAPH_STYLE.align,
  };
  const size = normalizeSize(surface);
  const scale = resolveSurfaceScale(size, s.fit, s.align);
  const index = indexNodes(dataset.nodes);

  // keys carry the position so repeated ids in curated data stay unique
  const edges: EdgeSegment[] = [];
  dataset.connections.forEach((c, i) => {
    const pair = resolveConnection(index, c);
    if (!pair) return;
    const from = projectPoint(pair[0].position, scale);
    const to = projectPoint(pair[1].position, scale);
    edges.push({
      kind: 'edge',
      key: `edge:${c.id}:${i}`,
      connectionId: c.id,
      source: c.source,
      target: c.target,
      x1: from.x,
      y1: from.y,
      x2: to.x,
      y2: to.y,
    });
  });

  const nodes: NodeDisk[] = dataset.nodes.map((n, i) => {
    const p = projectPoint(n.position, scale);
    return {
      kind: 'node',
      key: `node:${n.id}:${i}`,
      nodeId: n.id,
      label: n.label,
      cx: p.x,
      cy: p.y,
      r: s.nodeRadius,
    };
  });

  return {
    width: size.width,
    height: size.height,
    color: s.color,
    nodeOpacity: NODE_OPACITY,
    edgeOpacity: clampEdgeOpacity(s.edgeOpacity),
    edgeWidth: s.edgeWidth,
    edges,
    nodes,
    items: [...edges, ...nodes],
  };
}
