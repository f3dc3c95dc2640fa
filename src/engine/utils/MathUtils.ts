export const MathUtils = {
  /** Clamp a value between min and max */
  clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, v));
  },

  /** Min-max normalisation into [0, 1]. A degenerate band yields 0. */
  normalize(v: number, min: number, max: number): number {
    if (max <= min) return 0;
    return MathUtils.clamp((v - min) / (max - min), 0, 1);
  },

  /** 32-bit string hash (x31), stable across runs. */
  hashString(value: string): number {
    let hash = 0;
    for (let i = 0; i < value.length; i++) {
      hash = (hash * 31 + value.charCodeAt(i)) >>> 0;
    }
    return hash;
  },

  /** mulberry32: deterministic floats in [0, 1) from a 32-bit seed. */
  createSeededRandom(seed: number): () => number {
    let t = seed >>> 0;
    return () => {
      t = (t + 0x6D2B79F5) >>> 0;
      let r = Math.imul(t ^ (t >>> 15), 1 | t);
      r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
      return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
    };
  },
};
