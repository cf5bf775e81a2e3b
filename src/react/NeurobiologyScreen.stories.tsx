import type { Meta, StoryObj } from '@storybook/react';
import React, { useEffect } from 'react';
import { NeurobiologyScreen } from './NeurobiologyScreen';
import { useNeuroStore } from '../state/store';

const meta: Meta<typeof NeurobiologyScreen> = {
  title: 'Screens/Neurobiology',
  component: NeurobiologyScreen,
  tags: ['dev'],
  parameters: {
    layout: 'fullscreen',
  },
};

export default meta;

type Story = StoryObj<typeof NeurobiologyScreen>;

export const Default: Story = {
  render: () => <NeurobiologyScreen style={{ maxWidth: 900, margin: '0 auto' }} />,
};

function SeveredOnMount({ children }: { children: React.ReactNode }) {
  useEffect(() => {
    useNeuroStore.getState().setSplit(true);
    return () => useNeuroStore.getState().reset();
  }, []);
  return <>{children}</>;
}

export const SplitBrainSevered: Story = {
  render: () => (
    <SeveredOnMount>
      <NeurobiologyScreen style={{ maxWidth: 900, margin: '0 auto' }} />
    </SeveredOnMount>
  ),
};
