export type NeuronId = number;

/** Position as a fraction of the drawing surface, origin top-left. Expected in [0,1] on both axes. */
export type NormalizedPoint = { x: number; y: number };

export type NeuralNode = {
  id: NeuronId;
  position: NormalizedPoint;
  /** Display metadata only. Not required to be unique and never used for lookups. */
  label: string;
};

/**
 * Directed connection between two nodes of the same dataset.
 * Endpoints that do not resolve to a node are skipped when drawing.
 */
export type NeuralConnection = {
  /** Stable key for list rendering; carries no domain meaning. */
  id: string;
  source: NeuronId;
  target: NeuronId;
};

export type NetworkDataset = {
  readonly nodes: readonly NeuralNode[];
  readonly connections: readonly NeuralConnection[];
};
