import { SelectionError, selectClips } from './engine.js';
import { SourceFile } from '../allocator/source-file.js';
import { FeatureScorer, type WindowAnalyzer } from '../scoring/features.js';
import { createRandom } from '../utils/random.js';

const EPS = 1e-9;

function source(path: string, totalDuration: number, timestamp = 0): SourceFile {
  return new SourceFile({ path, totalDuration, timestamp, minGap: 1 });
}

function assertNoOverlap(sources: SourceFile[]): void {
  for (const s of sources) {
    const committed = s.committed;
    for (let i = 1; i < committed.length; i++) {
      expect(committed[i].start - committed[i - 1].end).toBeGreaterThanOrEqual(s.minGap - EPS);
    }
  }
}

describe('selectClips — plain policy', () => {
  it('selects ceil(total / clip length) clips when capacity allows', () => {
    const sources = [source('/v/a.mp4', 120, 1), source('/v/b.mp4', 90, 2), source('/v/c.mp4', 60, 3)];
    const result = selectClips(sources, { clipLength: 5, totalDuration: 42 }, { random: createRandom(11) });
    expect(result.requestedClips).toBe(9);
    expect(result.clips).toHaveLength(9);
    expect(result.status).toBe('complete');
    expect(result.shortfall).toBe(0);
    expect(result.selectedDuration).toBe(45);
    assertNoOverlap(sources);
  });

  it('keeps every clip inside its source and copies the source timestamp', () => {
    const sources = [source('/v/a.mp4', 30, 100), source('/v/b.mp4', 30, 200)];
    const result = selectClips(sources, { clipLength: 4, totalDuration: 20 }, { random: createRandom(5) });
    for (const clip of result.clips) {
      expect(clip.start).toBeGreaterThanOrEqual(0);
      expect(clip.start + clip.duration).toBeLessThanOrEqual(clip.source.totalDuration + EPS);
      expect(clip.timestamp).toBe(clip.source.timestamp);
      expect(clip.features).toEqual({ scene: 0, motion: 0, color: 0 });
    }
  });

  it('sorts the result by timestamp, then start', () => {
    const sources = [source('/v/c.mp4', 80, 3), source('/v/a.mp4', 80, 1), source('/v/b.mp4', 80, 2)];
    const result = selectClips(sources, { clipLength: 3, totalDuration: 60 }, { random: createRandom(8) });
    for (let i = 1; i < result.clips.length; i++) {
      const prev = result.clips[i - 1];
      const cur = result.clips[i];
      expect(cur.timestamp).toBeGreaterThanOrEqual(prev.timestamp);
      if (cur.timestamp === prev.timestamp) expect(cur.start).toBeGreaterThanOrEqual(prev.start);
    }
  });

  it('draws the first clip from the source with the most remaining capacity', () => {
    for (let seed = 0; seed < 20; seed++) {
      const sources = [source('/v/small.mp4', 10), source('/v/big.mp4', 100)];
      const result = selectClips(sources, { clipLength: 5, totalDuration: 5 }, { random: createRandom(seed) });
      expect(result.clips[0].source.path).toBe('/v/big.mp4');
    }
  });

  it('returns an empty result with the full shortfall when no source is long enough', () => {
    const sources = [source('/v/a.mp4', 2), source('/v/b.mp4', 0)];
    const result = selectClips(sources, { clipLength: 5, totalDuration: 60 }, { random: createRandom(1) });
    expect(result.status).toBe('empty');
    expect(result.clips).toEqual([]);
    expect(result.shortfall).toBe(60);
  });

  it('reports a partial result when capacity runs out', () => {
    const sources = [source('/v/a.mp4', 12)];
    const result = selectClips(sources, { clipLength: 5, totalDuration: 30 }, { random: createRandom(4) });
    expect(result.status).toBe('partial');
    expect(result.clips.length).toBeGreaterThanOrEqual(1);
    expect(result.clips.length).toBeLessThanOrEqual(2);
    expect(result.shortfall).toBe(30 - result.clips.length * 5);
    assertNoOverlap(sources);
  });

  it('reserves transition headroom in the source', () => {
    const a = source('/v/a.mp4', 100);
    const result = selectClips([a], { clipLength: 10, totalDuration: 10, transitionHeadroom: 0.7 }, { random: createRandom(2) });
    const [clip] = result.clips;
    expect(clip.duration).toBe(10);
    expect(clip.reservation.end - clip.reservation.start).toBeCloseTo(17, 10);
    expect(a.committed).toEqual([clip.reservation]);
  });

  it('rejects invalid options with a SelectionError', () => {
    expect(() =>
      selectClips([], { clipLength: 5, totalDuration: 10, diversityWeight: 1.5 }, { random: createRandom(1) }),
    ).toThrow(SelectionError);
    expect(() =>
      selectClips([], { clipLength: 0, totalDuration: 10 }, { random: createRandom(1) }),
    ).toThrow('Invalid selection options: clipLength');
  });

  it('is reproducible for a fixed seed', () => {
    const run = () => {
      const sources = [source('/v/a.mp4', 50, 1), source('/v/b.mp4', 70, 2)];
      return selectClips(sources, { clipLength: 4, totalDuration: 32 }, { random: createRandom(77) })
        .clips.map((c) => [c.source.path, c.start]);
    };
    expect(run()).toEqual(run());
  });
});

describe('selectClips — diverse policy', () => {
  // /v/a.mp4 windows look "better" (0.8) than /v/b.mp4 windows (0.2).
  const analyzer: WindowAnalyzer = (src) =>
    src.path === '/v/a.mp4'
      ? { scene: 0.8, motion: 0.8, color: 0.8 }
      : { scene: 0.2, motion: 0.2, color: 0.2 };

  function run(diversityWeight: number, windowAnalyzer: WindowAnalyzer = analyzer): Map<string, number> {
    const sources = [source('/v/a.mp4', 1000, 1), source('/v/b.mp4', 1000, 2)];
    const random = createRandom(123);
    const result = selectClips(
      sources,
      { clipLength: 5, totalDuration: 50, policy: 'diverse', diversityWeight },
      { random, scorer: new FeatureScorer(random, windowAnalyzer) },
    );
    expect(result.clips).toHaveLength(10);
    const counts = new Map<string, number>();
    for (const clip of result.clips) {
      counts.set(clip.source.path, (counts.get(clip.source.path) ?? 0) + 1);
    }
    return counts;
  }

  it('picks only the highest-quality source at weight 0', () => {
    const counts = run(0);
    expect(counts.get('/v/a.mp4')).toBe(10);
    expect(counts.get('/v/b.mp4')).toBeUndefined();
  });

  it('spreads selections across sources at weight 1', () => {
    const counts = run(1);
    expect(counts.get('/v/a.mp4')).toBeGreaterThan(0);
    expect(counts.get('/v/b.mp4')).toBeGreaterThanOrEqual(4);
  });

  it('uses both near-identical sources far more often at weight 1 than at weight 0', () => {
    const nearlyEqual: WindowAnalyzer = (src) =>
      src.path === '/v/a.mp4'
        ? { scene: 0.51, motion: 0.51, color: 0.51 }
        : { scene: 0.5, motion: 0.5, color: 0.5 };
    const greedy = run(0, nearlyEqual);
    const diverse = run(1, nearlyEqual);
    expect(greedy.size).toBe(1);
    expect(greedy.get('/v/b.mp4') ?? 0).toBe(0);
    expect(diverse.size).toBe(2);
    expect(diverse.get('/v/b.mp4') ?? 0).toBeGreaterThanOrEqual(3);
  });

  it('attaches scored features and reports per-source profiles', () => {
    const sources = [source('/v/a.mp4', 60, 1), source('/v/b.mp4', 60, 2)];
    const random = createRandom(9);
    const result = selectClips(
      sources,
      { clipLength: 5, totalDuration: 10, policy: 'diverse', diversityWeight: 0 },
      { random, scorer: new FeatureScorer(random, analyzer) },
    );
    expect(result.profiles.map((p) => p.path)).toEqual(['/v/a.mp4', '/v/b.mp4']);
    expect(result.profiles[0].features.scene).toBeCloseTo(0.8, 10);
    expect(result.profiles[1].features.color).toBeCloseTo(0.2, 10);
    expect(result.clips.every((c) => c.features.scene === 0.8)).toBe(true);
  });

  it('falls back to the plain draw when every candidate is below the scene threshold', () => {
    const sources = [source('/v/b.mp4', 60, 2)];
    const random = createRandom(9);
    const result = selectClips(
      sources,
      { clipLength: 5, totalDuration: 15, policy: 'diverse', minSceneScore: 0.5 },
      { random, scorer: new FeatureScorer(random, analyzer) },
    );
    expect(result.clips).toHaveLength(3);
    expect(result.status).toBe('complete');
    assertNoOverlap(sources);
  });

  it('returns an empty result when no source can fit a clip', () => {
    const result = selectClips(
      [source('/v/a.mp4', 3)],
      { clipLength: 5, totalDuration: 20, policy: 'diverse' },
      { random: createRandom(1) },
    );
    expect(result.status).toBe('empty');
    expect(result.shortfall).toBe(20);
  });
});
