import React from 'react';
import { dynamicCoreSchematic } from '../data/dynamicCore';
import type { DynamicCoreSchematic } from '../data/dynamicCore';

export type DynamicCoreDiagramProps = {
  schematic?: DynamicCoreSchematic;
  height?: number;
  style?: React.CSSProperties;
};

/** Main complex with its members, plus dashed pathways that stay outside it. */
export function DynamicCoreDiagram({ schematic = dynamicCoreSchematic, height = 300, style }: DynamicCoreDiagramProps) {
  const { complex, members, pathways } = schematic;
  return (
    <section data-testid="dynamic-core" style={{ display: 'flex', flexDirection: 'column', gap: 15, ...style }}>
      <h2 style={{ margin: 0 }}>2. The Dynamic Core: What&apos;s In and What&apos;s Out?</h2>
      <p style={{ lineHeight: 1.5, margin: 0 }}>
        IIT predicts that not all active neurons contribute to conscious experience. Consciousness is a
        property of the &apos;main complex&apos;, a &apos;dynamic core&apos; of high Φ. Other neural circuits,
        though crucial for brain function, can be informationally insulated from this core, acting as
        inputs, outputs, or automated loops (Tononi and Edelman 1998).
      </p>
      <svg
        data-testid="dynamic-core-diagram"
        viewBox={`0 0 ${schematic.width} ${schematic.height}`}
        height={height}
        width="100%"
        preserveAspectRatio="xMidYMid meet"
        style={{ overflow: 'visible' }}
      >
        <circle
          data-testid="dynamic-core-complex"
          cx={complex.center.x}
          cy={complex.center.y}
          r={complex.radius}
          fill={complex.fill}
          stroke={complex.stroke}
          strokeWidth={2}
        />
        <text x={complex.center.x} y={complex.center.y - 100} textAnchor="middle" fontWeight={700}>
          {complex.label}
        </text>
        {members.offsets.map((o, i) => (
          <circle
            key={i}
            data-testid="dynamic-core-member"
            cx={complex.center.x + o.x}
            cy={complex.center.y + o.y}
            r={members.radius}
            fill={complex.stroke}
            fillOpacity={0.8}
          />
        ))}
        {pathways.map((p) => (
          <g key={p.id} data-testid="dynamic-core-pathway" data-pathway={p.id}>
            <path d={p.path} fill="none" stroke={p.color} strokeWidth={2} strokeDasharray="5" />
            <text x={p.labelAt.x} y={p.labelAt.y} textAnchor="middle" fontSize={12} fontWeight={700}>
              {p.label}
            </text>
          </g>
        ))}
      </svg>
      <p style={{ margin: 0 }}>
        These external systems provide input and receive output but do not share in the integrated
        information of the core itself. Their causal link to the complex is limited to narrow
        &apos;ports-in&apos; and &apos;ports-out.&apos;
      </p>
    </section>
  );
}
