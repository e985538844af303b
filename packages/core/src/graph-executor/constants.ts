export const DEFAULT_MAX_STEPS = 1_000;
