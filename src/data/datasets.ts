import type { NeuralConnection, NeuralNode, NeuronId } from '../types';
import { createDataset, severConnections } from '../core/graph';

function node(id: NeuronId, x: number, y: number, label: string): NeuralNode {
  return { id, position: { x, y }, label };
}

function connector(prefix: string) {
  return (source: NeuronId, target: NeuronId): NeuralConnection => ({
    id: `${prefix}:${source}->${target}`,
    source,
    target,
  });
}

const tc = connector('thalamocortical');

/** Dense, integrated architecture: one complex with several cross-cutting paths. */
export const thalamocortical = createDataset(
  [
    node(1, 0.2, 0.2, 'A'),
    node(2, 0.8, 0.1, 'B'),
    node(3, 0.5, 0.5, 'C'),
    node(4, 0.2, 0.8, 'D'),
    node(5, 0.9, 0.9, 'E'),
    node(6, 0.6, 0.2, 'F'),
  ],
  [
    tc(1, 3),
    tc(1, 4),
    tc(2, 3),
    tc(2, 5),
    tc(3, 4),
    tc(3, 6),
    tc(4, 5),
    tc(1, 6),
    // long-range integration
    tc(2, 1),
    tc(4, 2),
  ],
);

const cb = connector('cerebellum');

/** Modular, insulated architecture: three closed triangles with nothing between them. */
export const cerebellum = createDataset(
  [
    node(1, 0.2, 0.2, 'A1'),
    node(2, 0.1, 0.4, 'A2'),
    node(3, 0.3, 0.3, 'A3'),
    node(4, 0.8, 0.2, 'B1'),
    node(5, 0.9, 0.4, 'B2'),
    node(6, 0.7, 0.3, 'B3'),
    node(7, 0.5, 0.8, 'C1'),
    node(8, 0.4, 0.9, 'C2'),
    node(9, 0.6, 0.9, 'C3'),
  ],
  [cb(1, 2), cb(2, 3), cb(3, 1), cb(4, 5), cb(5, 6), cb(6, 4), cb(7, 8), cb(8, 9), cb(9, 7)],
);

const LEFT_HEMISPHERE: ReadonlySet<NeuronId> = new Set([1, 2, 3, 4]);

export function sameHemisphere(a: NeuralNode, b: NeuralNode): boolean {
  return LEFT_HEMISPHERE.has(a.id) === LEFT_HEMISPHERE.has(b.id);
}

const sb = connector('split-brain');

/** Two hemispheres joined by callosal fibres. */
export const splitBrainIntact = createDataset(
  [
    node(1, 0.15, 0.3, 'L1'),
    node(2, 0.4, 0.25, 'L2'),
    node(3, 0.4, 0.7, 'L3'),
    node(4, 0.15, 0.75, 'L4'),
    node(5, 0.6, 0.25, 'R1'),
    node(6, 0.85, 0.3, 'R2'),
    node(7, 0.85, 0.75, 'R3'),
    node(8, 0.6, 0.7, 'R4'),
  ],
  [
    sb(1, 2),
    sb(2, 3),
    sb(3, 4),
    sb(4, 1),
    sb(1, 3),
    sb(5, 6),
    sb(6, 7),
    sb(7, 8),
    sb(8, 5),
    sb(6, 8),
    // corpus callosum
    sb(2, 5),
    sb(3, 8),
    sb(5, 3),
  ],
);

export const splitBrainSevered = severConnections(splitBrainIntact, sameHemisphere);
