export type MorphologyOperation = "erosion" | "dilation" | "opening" | "closing";

/**
 * Apply `test` over a boxcar of `p` samples starting `floor(p / 2)` above each
 * sample. Samples beyond either end read as 0.
 */
function boxcar(log: readonly number[], p: number, test: (window: number[]) => boolean): number[] {
  const half = Math.floor(p / 2);
  return log.map((_, i) => {
    const window: number[] = [];
    for (let j = i - half; j < i - half + p; j++) window.push(log[j] ?? 0);
    return test(window) ? 1 : 0;
  });
}

export function erode(log: readonly number[], p: number): number[] {
  return boxcar(log, p, (w) => w.every((v) => v === 1));
}

export function dilate(log: readonly number[], p: number): number[] {
  return boxcar(log, p, (w) => w.some((v) => v === 1));
}

/**
 * Binary morphology on a 0/1 log with a structuring element of `p` samples.
 * Closing keeps every originally set sample, so the ends are not eroded away.
 * Negative (undefined) samples take no part and are passed through.
 */
export function applyMorphology(log: readonly number[], operation: MorphologyOperation, p: number): number[] {
  const binary = log.map((v) => (v === 1 ? 1 : 0));
  let out: number[];
  switch (operation) {
    case "erosion":
      out = erode(binary, p);
      break;
    case "dilation":
      out = dilate(binary, p);
      break;
    case "opening":
      out = dilate(erode(binary, p), p);
      break;
    case "closing":
      out = erode(dilate(binary, p), p).map((v, i) => v | binary[i]);
      break;
  }
  return out.map((v, i) => (log[i] < 0 ? log[i] : v));
}
