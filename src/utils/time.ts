// Shared time helpers for progress math and polling loops.

export const clampRatio = (value: number, max = 1) => {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(Math.max(0, value), max);
};

export const elapsedSecondsSince = (startedAt: number, now = Date.now()) =>
  Math.max(0, (now - startedAt) / 1000);

export const delay = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, Math.max(0, ms));
  });
