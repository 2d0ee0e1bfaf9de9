import { buildSnapshot, percentage, round1, severityForScore, topicStats } from '../../../services/performance.service';
import { HOUR, T0, answers, student } from '../../test-utils/factories';

describe('severityForScore', () => {
  it('is danger strictly below 30', () => {
    expect(severityForScore(29.9)).toBe('danger');
    expect(severityForScore(0)).toBe('danger');
  });

  it('is warning from 30 up', () => {
    expect(severityForScore(30)).toBe('warning');
    expect(severityForScore(49.9)).toBe('warning');
    expect(severityForScore(100)).toBe('warning');
  });
});

describe('percentages', () => {
  it('rounds to one decimal', () => {
    expect(round1(37.5)).toBe(37.5);
    expect(round1(33.333)).toBe(33.3);
    expect(percentage(2, 3)).toBe(66.7);
    expect(percentage(0, 0)).toBe(0);
  });

  it('aggregates answers per topic', () => {
    const stats = topicStats([...answers('s1', 'A', 3, 8), ...answers('s1', 'B', 4, 5)]);
    expect([...stats.entries()]).toEqual([
      ['A', { total: 8, correct: 3, percentage: 37.5 }],
      ['B', { total: 5, correct: 4, percentage: 80 }],
    ]);
  });
});

describe('buildSnapshot', () => {
  it('returns null for a student with zero answers', () => {
    expect(buildSnapshot(student('s1'), [], T0)).toBeNull();
  });

  it('computes the overall score and the trailing 24h score', () => {
    const now = new Date(T0.getTime() + 48 * HOUR);
    const old = answers('s1', 'A', 1, 6, T0);
    const recent = answers('s1', 'A', 3, 4, new Date(now.getTime() - HOUR));
    const snapshot = buildSnapshot(student('s1', 'Ada'), [...old, ...recent], now);
    expect(snapshot).toMatchObject({
      studentId: 's1',
      studentName: 'Ada',
      total: 10,
      correct: 4,
      score: 40,
      recentScore: 75,
    });
  });

  it('leaves recentScore null when nothing was answered in the last day', () => {
    const now = new Date(T0.getTime() + 25 * HOUR);
    expect(buildSnapshot(student('s1'), answers('s1', 'A', 2, 4, T0), now)?.recentScore).toBeNull();
  });
});
