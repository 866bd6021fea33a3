/**
 * Coarse-grained wait used by the polling and retry loops.
 * Components take it as an injectable dependency so tests can record delays.
 */
export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
