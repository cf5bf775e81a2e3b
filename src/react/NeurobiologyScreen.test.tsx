/* @vitest-environment jsdom */

import React, { act } from 'react';
import ReactDOM from 'react-dom/client';
import { describe, it, expect, beforeEach } from 'vitest';
import { NeurobiologyScreen } from './NeurobiologyScreen';
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

describe('NeurobiologyScreen', () => {
  beforeEach(() => {
    useNeuroStore.setState({ isSplit: false });
  });

  it('renders the four sections in order', async () => {
    const { container, unmount } = await render(<NeurobiologyScreen />);
    const screen = container.querySelector('[data-testid="neurobiology-screen"]');
    const sections = Array.from(screen?.querySelectorAll('section') ?? []).map((s) =>
      s.getAttribute('data-testid'),
    );
    expect(sections).toEqual(['architecture', 'dynamic-core', 'split-brain', 'references']);
    unmount();
  });

  it('compares one integrated complex against three isolated ones', async () => {
    const { container, unmount } = await render(<NeurobiologyScreen />);
    const arch = container.querySelector('[data-testid="architecture"]');
    const titles = Array.from(arch?.querySelectorAll('[data-testid="network-graph-title"]') ?? []).map(
      (el) => el.textContent,
    );
    expect(titles).toEqual(['Thalamocortical-like (High Φ)', 'Cerebellum-like (Low Φ)']);
    const captions = Array.from(arch?.querySelectorAll('[data-testid="architecture-caption"]') ?? []).map(
      (el) => el.textContent,
    );
    expect(captions).toEqual(['1 complex', '3 complexes']);
    unmount();
  });

  it('draws the dynamic core with three members and three insulated pathways', async () => {
    const { container, unmount } = await render(<NeurobiologyScreen />);
    expect(container.querySelectorAll('[data-testid="dynamic-core-member"]').length).toBe(3);
    const pathways = Array.from(container.querySelectorAll('[data-testid="dynamic-core-pathway"]')).map((g) =>
      g.getAttribute('data-pathway'),
    );
    expect(pathways).toEqual(['sensory', 'motor', 'subcortical']);
    unmount();
  });

  it('lists the references in author-date form', async () => {
    const { container, unmount } = await render(<NeurobiologyScreen />);
    const items = Array.from(container.querySelectorAll('[data-testid="reference"]')).map((p) => p.textContent);
    expect(items).toEqual([
      'Sperry, Roger. 1984. “Consciousness, Personal Identity and the Divided Brain.” Neuropsychologia 22 (6): 661–73. https://doi.org/10.1016/0028-3932(84)90093-9.',
      'Tononi, Giulio. 2004. “An Information Integration Theory of Consciousness.” BMC Neuroscience 5 (1): 42. https://doi.org/10.1186/1471-2202-5-42.',
      'Tononi, Giulio, and Gerald M. Edelman. 1998. “Consciousness and Complexity.” Science 282 (5395): 1846–51. https://doi.org/10.1126/science.282.5395.1846.',
    ]);
    const venues = Array.from(container.querySelectorAll('[data-testid="reference"] em')).map((em) => em.textContent);
    expect(venues).toEqual(['Neuropsychologia', 'BMC Neuroscience', 'Science']);
    const firstLink = container.querySelector('[data-testid="reference"] a');
    expect(firstLink?.getAttribute('href')).toBe('https://doi.org/10.1016/0028-3932(84)90093-9');
    unmount();
  });
});
