import { useEffect, useRef, useState } from 'react';

/**
 * Client size of a graph's drawing area, so a NetworkGraph without a fixed
 * width/height can fit its square to whatever box the layout gives it.
 * Measured once on mount, then again on every resize when ResizeObserver exists.
 */
export function useElementSize<T extends HTMLElement>() {
  const ref = useRef<T | null>(null);
  const [size, setSize] = useState({ width: 0, height: 0 });
  useEffect(() => {
    const el = ref.current;
    if (!el) return;
    const measure = () => {
      const width = el.clientWidth;
      const height = el.clientHeight;
      // keep the previous object when nothing changed
      setSize((prev) => (prev.width === width && prev.height === height ? prev : { width, height }));
    };
    const RO: typeof ResizeObserver | undefined =
      typeof ResizeObserver === 'function' ? ResizeObserver : undefined;
    measure();
    if (!RO) return;
    const ro = new RO(measure);
    ro.observe(el);
    return () => ro.disconnect();
  }, []);
  return { ref, ...size } as const;
}
