import React from 'react';
import { NetworkGraph } from './NetworkGraph';
import { connectedComponents } from '../core/graph';
import { cerebellum, thalamocortical } from '../data/datasets';
import type { NetworkDataset } from '../types';

type Comparison = { title: string; dataset: NetworkDataset; color: string };

const comparisons: Comparison[] = [
  { title: 'Thalamocortical-like (High Φ)', dataset: thalamocortical, color: '#2563eb' },
  { title: 'Cerebellum-like (Low Φ)', dataset: cerebellum, color: '#16a34a' },
];

export type NeuroArchitecturePanelProps = {
  /** Height of the row holding both graphs. */
  height?: number;
  style?: React.CSSProperties;
};

export function NeuroArchitecturePanel({ height = 300, style }: NeuroArchitecturePanelProps) {
  return (
    <section data-testid="architecture" style={{ display: 'flex', flexDirection: 'column', gap: 15, ...style }}>
      <h2 style={{ margin: 0 }}>1. Thalamocortical System vs. The Cerebellum</h2>
      <p style={{ lineHeight: 1.5, margin: 0 }}>
        A central puzzle in neuroscience is why the thalamocortical system is essential for
        consciousness, while the cerebellum, which contains far more neurons, contributes minimally.
        IIT proposes that the answer lies in their fundamentally different architectures (Tononi 2004).
      </p>
      <ul style={{ margin: 0, paddingLeft: 20, lineHeight: 1.5 }}>
        <li>
          <strong>Thalamocortical System:</strong> a mix of functional specialization and widespread
          integration, forming a single large &apos;main complex&apos; with a <strong>high Φ value</strong>.
        </li>
        <li>
          <strong>Cerebellum:</strong> highly parallel, independent modules. Efficient for automated tasks
          but no global integration: many small, isolated complexes, each with a <strong>low Φ value</strong>.
        </li>
      </ul>
      <div style={{ display: 'flex', gap: 20, height }}>
        {comparisons.map((c) => {
          const complexes = connectedComponents(c.dataset).length;
          return (
            <div key={c.title} style={{ flex: 1, display: 'flex', flexDirection: 'column', minWidth: 0 }}>
              <NetworkGraph dataset={c.dataset} color={c.color} title={c.title} style={{ flex: 1 }} />
              <div data-testid="architecture-caption" style={{ fontSize: 12, color: '#6b7280', textAlign: 'center' }}>
                {complexes === 1 ? '1 complex' : `${complexes} complexes`}
              </div>
            </div>
          );
        })}
      </div>
    </section>
  );
}
