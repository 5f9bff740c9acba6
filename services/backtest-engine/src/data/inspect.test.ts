import { describe, it, expect } from 'vitest';
import { describeSeries, previewBars } from './inspect.js';
import { createSeries } from '../__fixtures__/series.js';

describe('previewBars', () => {
  it('기본 최근 5개 봉', () => {
    const series = createSeries([1, 2, 3, 4, 5, 6, 7]);

    expect(previewBars(series).map((bar) => bar.close)).toEqual([3, 4, 5, 6, 7]);
  });

  it('봉 수가 적으면 전부', () => {
    expect(previewBars(createSeries([1, 2]), 5)).toHaveLength(2);
  });

  it('n <= 0이면 빈 배열', () => {
    expect(previewBars(createSeries([1, 2]), 0)).toEqual([]);
  });
});

describe('describeSeries', () => {
  it('컬럼별 기술 통계 (선형 보간 분위수, 표본 표준편차)', () => {
    const stats = describeSeries(createSeries([4, 1, 3, 2]));

    expect(stats.close.count).toBe(4);
    expect(stats.close.mean).toBe(2.5);
    expect(stats.close.std).toBeCloseTo(Math.sqrt(5 / 3), 12);
    expect(stats.close.min).toBe(1);
    expect(stats.close.p25).toBe(1.75);
    expect(stats.close.p50).toBe(2.5);
    expect(stats.close.p75).toBe(3.25);
    expect(stats.close.max).toBe(4);
  });

  it('값이 모두 같으면 표준편차 0', () => {
    const stats = describeSeries(createSeries([5, 5, 5]));

    expect(stats.volume).toEqual({ count: 3, mean: 1000, std: 0, min: 1000, p25: 1000, p50: 1000, p75: 1000, max: 1000 });
  });

  it('봉 1개면 표준편차 null', () => {
    expect(describeSeries(createSeries([7])).open.std).toBeNull();
  });
});
