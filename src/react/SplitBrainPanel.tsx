import React, { useMemo } from 'react';
import { NetworkGraph } from './NetworkGraph';
import { useIsSplit, useSplitBrainActions } from '../state/store';
import { connectedComponents } from '../core/graph';
import { splitBrainIntact, splitBrainSevered } from '../data/datasets';

const COUNT_WORDS = ['Zero', 'One', 'Two', 'Three', 'Four', 'Five'];

export function describeComplexes(count: number): string {
  if (count === 1) return 'Result: One main complex with high Φ.';
  const word = COUNT_WORDS[count] ?? String(count);
  return `Result: ${word} independent complexes with lower Φ each.`;
}

export type SplitBrainPanelProps = {
  /** Accent for the graph. */
  color?: string;
  /** Side of the square drawing area. */
  graphSize?: number;
  style?: React.CSSProperties;
};

export function SplitBrainPanel({ color = '#ea580c', graphSize = 220, style }: SplitBrainPanelProps) {
  const isSplit = useIsSplit();
  const { setSplit } = useSplitBrainActions();
  const dataset = isSplit ? splitBrainSevered : splitBrainIntact;
  const complexes = useMemo(() => connectedComponents(dataset).length, [dataset]);

  return (
    <section data-testid="split-brain" style={{ display: 'flex', flexDirection: 'column', gap: 15, ...style }}>
      <h2 style={{ margin: 0 }}>3. Splitting Consciousness</h2>
      <p style={{ lineHeight: 1.5, margin: 0 }}>
        Studies of &apos;split-brain&apos; patients, whose corpus callosum connecting the two hemispheres
        was severed, show that consciousness itself can be divided (Sperry 1984). IIT explains this by
        modeling how cutting these connections fractures a single large complex into two smaller,
        independent ones, each supporting a private conscious experience.
      </p>
      <label style={{ display: 'flex', alignItems: 'center', gap: 8, fontWeight: 600 }}>
        <input
          type="checkbox"
          data-testid="split-brain-toggle"
          checked={isSplit}
          onChange={(e) => setSplit(e.currentTarget.checked)}
        />
        Sever Corpus Callosum
      </label>
      <div
        style={{
          display: 'flex',
          flexDirection: 'column',
          alignItems: 'center',
          padding: 16,
          borderRadius: 10,
          background: '#f2f2f7',
        }}
      >
        <div data-testid="split-brain-state" style={{ fontWeight: 600, marginBottom: 5 }}>
          {isSplit ? 'State: Split Brain' : 'State: Intact Brain'}
        </div>
        <NetworkGraph
          dataset={dataset}
          color={color}
          width={graphSize}
          height={graphSize}
          style={{ background: 'transparent', padding: 0 }}
        />
        <div data-testid="split-brain-result" style={{ fontSize: 12, color: '#6b7280', marginTop: 5 }}>
          {describeComplexes(complexes)}
        </div>
      </div>
    </section>
  );
}
