/* @vitest-environment jsdom */

import React, { act } from 'react';
import ReactDOM from 'react-dom/client';
import { describe, it, expect, beforeEach } from 'vitest';
import { SplitBrainPanel, describeComplexes } from './SplitBrainPanel';
import { useNeuroStore } from '../state/store';

async function render(ui: React.ReactElement) {
  const container = document.createElement('div');
  document.body.appendChild(container);
  const root = ReactDOM.createRoot(container);
  await act(async () => {
    root.render(ui);
  });
  await Promise.resolve();
  return { container, root, unmount: () => root.unmount() };
}

const text = (root: ParentNode, testId: string) =>
  root.querySelector(`[data-testid="${testId}"]`)?.textContent;

describe('describeComplexes', () => {
  it('reads one complex as the unified case', () => {
    expect(describeComplexes(1)).toBe('Result: One main complex with high Φ.');
  });

  it('spells small counts and falls back to digits', () => {
    expect(describeComplexes(2)).toBe('Result: Two independent complexes with lower Φ each.');
    expect(describeComplexes(12)).toBe('Result: 12 independent complexes with lower Φ each.');
  });
});

describe('SplitBrainPanel', () => {
  beforeEach(() => {
    useNeuroStore.setState({ isSplit: false });
  });

  it('shows the intact brain with callosal connections', async () => {
    const { container, unmount } = await render(<SplitBrainPanel />);
    expect(text(container, 'split-brain-state')).toBe('State: Intact Brain');
    expect(text(container, 'split-brain-result')).toBe('Result: One main complex with high Φ.');
    expect(container.querySelectorAll('[data-testid="network-graph-edge"]').length).toBe(13);
    unmount();
  });

  it('severing drops the callosal connections and reports two complexes', async () => {
    const { container, unmount } = await render(<SplitBrainPanel />);
    const toggle = container.querySelector<HTMLInputElement>('[data-testid="split-brain-toggle"]');
    expect(toggle?.checked).toBe(false);

    await act(async () => {
      toggle?.click();
    });

    expect(useNeuroStore.getState().isSplit).toBe(true);
    expect(toggle?.checked).toBe(true);
    expect(text(container, 'split-brain-state')).toBe('State: Split Brain');
    expect(text(container, 'split-brain-result')).toBe(
      'Result: Two independent complexes with lower Φ each.',
    );
    expect(container.querySelectorAll('[data-testid="network-graph-edge"]').length).toBe(10);
    expect(container.querySelectorAll('[data-testid="network-graph-node"]').length).toBe(8);
    unmount();
  });

  it('follows store changes made elsewhere', async () => {
    const { container, unmount } = await render(<SplitBrainPanel />);
    await act(async () => {
      useNeuroStore.getState().toggleSplit();
    });
    expect(text(container, 'split-brain-state')).toBe('State: Split Brain');
    await act(async () => {
      useNeuroStore.getState().reset();
    });
    expect(text(container, 'split-brain-state')).toBe('State: Intact Brain');
    unmount();
  });

  it('draws the graph on a square of graphSize', async () => {
    const { container, unmount } = await render(<SplitBrainPanel graphSize={180} />);
    const svg = container.querySelector('[data-testid="network-graph-surface"]');
    expect(svg?.getAttribute('width')).toBe('180');
    expect(svg?.getAttribute('height')).toBe('180');
    unmount();
  });
});
