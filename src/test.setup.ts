// Shared test setup for Vitest
// Tells React the jsdom tests wrap updates in act(), which silences the act() environment warning.
;(globalThis as { IS_REACT_ACT_ENVIRONMENT?: boolean }).IS_REACT_ACT_ENVIRONMENT = true;
