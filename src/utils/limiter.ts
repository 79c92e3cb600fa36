export type Lane = 'ncbi_eutils' | 'article_extract';

export type LimiterConfig = Record<Lane, number>;

const defaultConfig: LimiterConfig = {
  ncbi_eutils: 3,
  article_extract: 8,
};

interface LaneState {
  max: number;
  running: number;
  queue: Array<() => void>;
}

export class LaneLimiter {
  private lanes: Record<Lane, LaneState>;

  constructor(config?: Partial<LimiterConfig>) {
    const merged: LimiterConfig = { ...defaultConfig, ...config };
    this.lanes = {
      ncbi_eutils: { max: Math.max(1, merged.ncbi_eutils), running: 0, queue: [] },
      article_extract: { max: Math.max(1, merged.article_extract), running: 0, queue: [] },
    };
  }

  async limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
    const state = this.lanes[lane];

    if (state.running < state.max) {
      return this.run(state, fn);
    }

    return new Promise<T>((resolve, reject) => {
      state.queue.push(() => {
        this.run(state, fn).then(resolve, reject);
      });
    });
  }

  pending(lane: Lane): number {
    return this.lanes[lane].queue.length;
  }

  private async run<T>(state: LaneState, fn: () => Promise<T>): Promise<T> {
    state.running++;
    try {
      return await fn();
    } finally {
      state.running--;
      this.processQueue(state);
    }
  }

  private processQueue(state: LaneState): void {
    if (state.running < state.max) {
      const next = state.queue.shift();
      if (next) next();
    }
  }
}

function envLimit(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

const globalLimiter = new LaneLimiter({
  ncbi_eutils: envLimit(process.env.EUTILS_CONCURRENCY, defaultConfig.ncbi_eutils),
  article_extract: envLimit(process.env.EXTRACT_CONCURRENCY, defaultConfig.article_extract),
});

export function limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
  return globalLimiter.limit(lane, fn);
}
