import React, { useMemo } from 'react';
import type { NetworkDataset } from '../types';
import { layoutNetwork } from '../core/layout';
import type { GraphStyle } from '../core/layout';
import { useElementSize } from './useElementSize';

export type NetworkGraphProps = {
  dataset: NetworkDataset;
  /** Accent color shared by nodes and edges. */
  color: string;
  title?: string;
  /** Fixed drawing size. When omitted, the drawing area fills its container and follows resizes. */
  width?: number;
  height?: number;
  graphStyle?: Partial<Omit<GraphStyle, 'color'>>;
  className?: string;
  style?: React.CSSProperties;
};

/**
 * Titled panel drawing a dataset as straight edges under uniform disks.
 * Stateless: output depends only on dataset, size and style.
 */
export function NetworkGraph({
  dataset,
  color,
  title,
  width,
  height,
  graphStyle,
  className,
  style,
}: NetworkGraphProps) {
  const measured = useElementSize<HTMLDivElement>();
  const w = width ?? measured.width;
  const h = height ?? measured.height;

  const layout = useMemo(
    () => layoutNetwork(dataset, { width: w, height: h }, { ...graphStyle, color }),
    [dataset, w, h, graphStyle, color],
  );

  return (
    <div
      data-testid="network-graph"
      className={className}
      style={{
        display: 'flex',
        flexDirection: 'column',
        padding: 16,
        borderRadius: 10,
        background: '#f2f2f7',
        boxSizing: 'border-box',
        ...style,
      }}
    >
      {title && (
        <div data-testid="network-graph-title" style={{ fontWeight: 600, textAlign: 'center', marginBottom: 8 }}>
          {title}
        </div>
      )}
      <div
        ref={measured.ref}
        style={{
          position: 'relative',
          flex: 1,
          minHeight: 0,
          width: width ?? '100%',
          height: height ?? '100%',
        }}
      >
        <svg
          data-testid="network-graph-surface"
          width={layout.width}
          height={layout.height}
          viewBox={`0 0 ${layout.width} ${layout.height}`}
          style={{ position: 'absolute', left: 0, top: 0, overflow: 'visible' }}
        >
          {layout.items.map((item) =>
            item.kind === 'edge' ? (
              <line
                key={item.key}
                data-testid="network-graph-edge"
                data-connection-id={item.connectionId}
                x1={item.x1}
                y1={item.y1}
                x2={item.x2}
                y2={item.y2}
                stroke={layout.color}
                strokeOpacity={layout.edgeOpacity}
                strokeWidth={layout.edgeWidth}
              />
            ) : (
              <circle
                key={item.key}
                data-testid="network-graph-node"
                data-node-id={item.nodeId}
                data-label={item.label}
                cx={item.cx}
                cy={item.cy}
                r={item.r}
                fill={layout.color}
                fillOpacity={layout.nodeOpacity}
              >
                <title>{item.label}</title>
              </circle>
            ),
          )}
        </svg>
      </div>
    </div>
  );
}
