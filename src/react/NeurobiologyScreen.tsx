import React from 'react';
import { NeuroArchitecturePanel } from './NeuroArchitecturePanel';
import { DynamicCoreDiagram } from './DynamicCoreDiagram';
import { SplitBrainPanel } from './SplitBrainPanel';
import { ReferencesList } from './ReferencesList';

export type NeurobiologyScreenProps = {
  className?: string;
  style?: React.CSSProperties;
};

const divider = <hr style={{ border: 0, borderTop: '1px solid #e5e7eb', width: '100%', margin: 0 }} />;

/** Single scrolling screen: architectures, dynamic core, split brain, references. */
export function NeurobiologyScreen({ className, style }: NeurobiologyScreenProps) {
  return (
    <main
      data-testid="neurobiology-screen"
      className={className}
      style={{ display: 'flex', flexDirection: 'column', gap: 30, padding: 16, overflowY: 'auto', ...style }}
    >
      <header>
        <h1 style={{ margin: '0 0 12px' }}>IIT and the Brain: Neurobiological Applications</h1>
        <p style={{ color: '#6b7280', margin: 0 }}>
          The Information Integration Theory (IIT) provides a principled framework for explaining why
          consciousness is associated with certain brain structures and states over others. This section
          explores several key neurobiological applications of the theory, demonstrating how the concept
          of integrated information (Φ) can be applied to real-world observations.
        </p>
      </header>
      <NeuroArchitecturePanel />
      {divider}
      <DynamicCoreDiagram />
      {divider}
      <SplitBrainPanel />
      {divider}
      <ReferencesList />
    </main>
  );
}
