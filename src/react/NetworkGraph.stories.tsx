import type { Meta, StoryObj } from '@storybook/react';
import React from 'react';
import { NetworkGraph } from './NetworkGraph';
import { cerebellum, splitBrainIntact, splitBrainSevered, thalamocortical } from '../data/datasets';
import { createDataset } from '../core/graph';

const meta: Meta<typeof NetworkGraph> = {
  title: 'Core/NetworkGraph',
  component: NetworkGraph,
  tags: ['dev'],
  args: {
    dataset: thalamocortical,
    color: '#2563eb',
    title: 'Thalamocortical-like (High Φ)',
  },
  argTypes: {
    color: { control: 'color' },
    dataset: { control: false },
  },
  decorators: [
    (Story) => (
      <div style={{ width: 360, height: 320, display: 'flex' }}>
        <Story />
      </div>
    ),
  ],
};

export default meta;

type Story = StoryObj<typeof NetworkGraph>;

export const Integrated: Story = {};

export const Modular: Story = {
  args: { dataset: cerebellum, color: '#16a34a', title: 'Cerebellum-like (Low Φ)' },
};

export const StretchedSurface: Story = {
  args: { graphStyle: { fit: 'stretch' } },
  decorators: [
    (Story) => (
      <div style={{ width: 560, height: 220, display: 'flex' }}>
        <Story />
      </div>
    ),
  ],
};

export const CenteredSquare: Story = {
  args: { graphStyle: { align: 'center' } },
  decorators: [
    (Story) => (
      <div style={{ width: 560, height: 220, display: 'flex' }}>
        <Story />
      </div>
    ),
  ],
};

export const SplitBrain: Story = {
  render: (args) => (
    <div style={{ display: 'flex', gap: 20 }}>
      <NetworkGraph {...args} dataset={splitBrainIntact} title="Intact" width={220} height={220} />
      <NetworkGraph {...args} dataset={splitBrainSevered} title="Severed" width={220} height={220} />
    </div>
  ),
  args: { color: '#ea580c' },
};

export const DanglingConnection: Story = {
  args: {
    title: 'Connection to a missing node is skipped',
    dataset: createDataset(
      [
        { id: 1, position: { x: 0.2, y: 0.2 }, label: 'A' },
        { id: 2, position: { x: 0.8, y: 0.8 }, label: 'B' },
      ],
      [
        { id: 'ab', source: 1, target: 2 },
        { id: 'b-missing', source: 2, target: 99 },
      ],
    ),
  },
};
