export * from './types';
export * from './core/geometry';
export * from './core/graph';
export * from './core/layout';
export * from './data/datasets';
export * from './data/dynamicCore';
export * from './data/references';
export * from './state/store';
export * from './react/useElementSize';
export * from './react/NetworkGraph';
export * from './react/NeuroArchitecturePanel';
export * from './react/DynamicCoreDiagram';
export * from './react/SplitBrainPanel';
export * from './react/ReferencesList';
export * from './react/NeurobiologyScreen';
