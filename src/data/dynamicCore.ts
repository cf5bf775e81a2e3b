import type { Point } from '../core/geometry';

export type InsulatedPathway = {
  id: 'sensory' | 'motor' | 'subcortical';
  label: string;
  color: string;
  /** SVG path data in diagram units. */
  path: string;
  labelAt: Point;
};

export type DynamicCoreSchematic = {
  width: number;
  height: number;
  complex: { center: Point; radius: number; label: string; fill: string; stroke: string };
  members: { offsets: Point[]; radius: number };
  pathways: InsulatedPathway[];
};

// Diagram units; the component scales the viewBox to its container.
export const dynamicCoreSchematic: DynamicCoreSchematic = {
  width: 400,
  height: 360,
  complex: {
    center: { x: 200, y: 150 },
    radius: 125,
    label: 'Main Complex (High Φ)',
    fill: 'rgba(234,179,8,0.2)',
    stroke: 'rgb(234,179,8)',
  },
  members: {
    offsets: [
      { x: -50, y: -50 },
      { x: 50, y: 20 },
      { x: 0, y: 60 },
    ],
    radius: 15,
  },
  pathways: [
    {
      id: 'sensory',
      label: 'Sensory Afferents (e.g., Retina)',
      color: '#2563eb',
      path: 'M 50 110 L 140 150',
      labelAt: { x: 40, y: 80 },
    },
    {
      id: 'motor',
      label: 'Motor Efferents (e.g., Actions)',
      color: '#dc2626',
      path: 'M 270 200 L 350 230',
      labelAt: { x: 360, y: 200 },
    },
    {
      id: 'subcortical',
      label: 'Subcortical Loop',
      color: '#16a34a',
      path: 'M 200 260 Q 150 300 200 340 Q 250 300 200 260',
      labelAt: { x: 200, y: 300 },
    },
  ],
};
