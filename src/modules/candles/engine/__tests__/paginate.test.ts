import { describe, it, expect, vi } from 'vitest';
import { paginateHistory, planWindow, nextWindowEnd } from '../paginate';
import type { ChunkResult, FetchWindow, HistoricalCandleClient, RawCandle } from '../../types';

const NOW = new Date('2026-10-18T10:15:00Z');
const day = (iso: string) => new Date(`${iso}T00:00:00Z`);
const iso = (date: Date) => date.toISOString().slice(0, 10);

function fakeClient(respond: (window: FetchWindow) => ChunkResult) {
  const windows: FetchWindow[] = [];
  const client: HistoricalCandleClient = {
    fetchChunk: vi.fn(async (_key: string, window: FetchWindow) => {
      windows.push(window);
      return respond(window);
    }),
  };
  return { client, windows };
}

function candleAt(window: FetchWindow): RawCandle {
  return [`${iso(window.end)}T00:00:00+05:30`, 10, 11, 9, 10.5, 1000, 0];
}

describe('paginateHistory', () => {
  describe('adaptive horizon', () => {
    const horizon = { kind: 'adaptive' as const, stopYear: 2000, guardYear: 2010 };

    it('stops after the first empty window that ends before the guard year', async () => {
      // Listed in 2015: windows ending before 2015 are empty
      const { client } = fakeClient((window) =>
        window.end.getUTCFullYear() >= 2015
          ? { ok: true, candles: [candleAt(window)] }
          : { ok: true, candles: [] }
      );

      const result = await paginateHistory(client, 'NSE_EQ|INE000000001', {
        horizon,
        chunkSpanDays: 1095,
        pacingDelayMs: 0,
        onFetchError: 'empty',
        now: NOW,
        sleep: async () => {},
      });

      expect(result.windows.map((w) => [iso(w.start), iso(w.end)])).toEqual([
        ['2023-10-19', '2026-10-18'],
        ['2020-10-19', '2023-10-19'],
        ['2017-10-20', '2020-10-19'],
        ['2014-10-21', '2017-10-20'],
        ['2011-10-22', '2014-10-21'],
        ['2008-10-22', '2011-10-22'],
        ['2005-10-23', '2008-10-22'],
      ]);
      expect(result.candles).toHaveLength(4);
      expect(result.failedWindows).toBe(0);
    });

    it('keeps walking while windows return data until the stop year', async () => {
      const { client } = fakeClient((window) => ({ ok: true, candles: [candleAt(window)] }));

      const result = await paginateHistory(client, 'KEY', {
        horizon,
        chunkSpanDays: 1095,
        pacingDelayMs: 0,
        onFetchError: 'empty',
        now: NOW,
        sleep: async () => {},
      });

      const last = result.windows[result.windows.length - 1];
      expect(last?.end.getUTCFullYear()).toBeGreaterThanOrEqual(2000);
      expect(last?.start.getUTCFullYear()).toBeLessThan(2000);
      expect(result.candles).toHaveLength(result.windows.length);
    });

    it('treats failed windows as empty and counts them', async () => {
      const { client } = fakeClient(() => ({ ok: false, reason: 'Upstox API error: 429 Too Many Requests' }));

      const result = await paginateHistory(client, 'KEY', {
        horizon,
        chunkSpanDays: 1095,
        pacingDelayMs: 0,
        onFetchError: 'empty',
        now: NOW,
        sleep: async () => {},
      });

      expect(result.windows).toHaveLength(7);
      expect(result.failedWindows).toBe(7);
      expect(result.candles).toEqual([]);
    });
  });

  describe('fixed horizon', () => {
    const horizon = { kind: 'fixed' as const, floorDate: day('2010-01-01') };

    it('covers [floor, now] with contiguous windows', async () => {
      const { client } = fakeClient(() => ({ ok: true, candles: [] }));

      const result = await paginateHistory(client, 'KEY', {
        horizon,
        chunkSpanDays: 1095,
        pacingDelayMs: 0,
        onFetchError: 'empty',
        now: NOW,
        sleep: async () => {},
      });

      const spans = result.windows.map((w) => [iso(w.start), iso(w.end)]);
      expect(spans).toEqual([
        ['2023-10-19', '2026-10-18'],
        ['2020-10-18', '2023-10-18'],
        ['2017-10-18', '2020-10-17'],
        ['2014-10-18', '2017-10-17'],
        ['2011-10-18', '2014-10-17'],
        ['2010-01-01', '2011-10-17'],
      ]);

      for (let i = 1; i < result.windows.length; i++) {
        const newer = result.windows[i - 1];
        const older = result.windows[i];
        if (!newer || !older) throw new Error('missing window');
        expect(newer.start.getTime() - older.end.getTime()).toBe(24 * 60 * 60 * 1000);
      }
    });

    it('never stops early on empty windows', async () => {
      const { client } = fakeClient((window) =>
        window.end.getUTCFullYear() >= 2024 ? { ok: true, candles: [candleAt(window)] } : { ok: true, candles: [] }
      );

      const result = await paginateHistory(client, 'KEY', {
        horizon,
        chunkSpanDays: 1095,
        pacingDelayMs: 0,
        onFetchError: 'empty',
        now: NOW,
        sleep: async () => {},
      });

      expect(result.windows).toHaveLength(6);
      expect(result.candles).toHaveLength(1);
    });

    it('issues a single clamped window when the floor is within one span', async () => {
      const { client, windows } = fakeClient(() => ({ ok: true, candles: [] }));

      await paginateHistory(client, 'KEY', {
        horizon: { kind: 'fixed', floorDate: day('2026-01-01') },
        chunkSpanDays: 1095,
        pacingDelayMs: 0,
        onFetchError: 'empty',
        now: NOW,
        sleep: async () => {},
      });

      expect(windows.map((w) => [iso(w.start), iso(w.end)])).toEqual([['2026-01-01', '2026-10-18']]);
    });
  });

  it('sleeps the pacing delay between consecutive windows only', async () => {
    const { client } = fakeClient(() => ({ ok: true, candles: [] }));
    const sleep = vi.fn(async (_ms: number) => {});

    const result = await paginateHistory(client, 'KEY', {
      horizon: { kind: 'fixed', floorDate: day('2010-01-01') },
      chunkSpanDays: 1095,
      pacingDelayMs: 500,
      onFetchError: 'empty',
      now: NOW,
      sleep,
    });

    expect(result.windows).toHaveLength(6);
    expect(sleep).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it('throws on a failed window when the policy is fail', async () => {
    const { client } = fakeClient(() => ({ ok: false, reason: 'Upstox API error: 500 Internal Server Error' }));

    await expect(
      paginateHistory(client, 'KEY', {
        horizon: { kind: 'fixed', floorDate: day('2010-01-01') },
        chunkSpanDays: 1095,
        pacingDelayMs: 0,
        onFetchError: 'fail',
        now: NOW,
        sleep: async () => {},
      })
    ).rejects.toThrow('Upstox API error: 500 Internal Server Error');
  });

  it('passes the instrument key through to the client', async () => {
    const { client } = fakeClient(() => ({ ok: true, candles: [] }));

    await paginateHistory(client, 'NSE_EQ|INE002A01018', {
      horizon: { kind: 'fixed', floorDate: day('2026-01-01') },
      chunkSpanDays: 1095,
      pacingDelayMs: 0,
      onFetchError: 'empty',
      now: NOW,
      sleep: async () => {},
    });

    expect(client.fetchChunk).toHaveBeenCalledWith('NSE_EQ|INE002A01018', expect.any(Object));
  });
});

describe('planWindow / nextWindowEnd', () => {
  it('returns null once the adaptive stop year is passed', () => {
    expect(planWindow(day('1999-12-31'), { kind: 'adaptive', stopYear: 2000, guardYear: 2010 }, 10)).toBeNull();
  });

  it('returns null once the fixed floor is passed', () => {
    expect(planWindow(day('2009-12-31'), { kind: 'fixed', floorDate: day('2010-01-01') }, 10)).toBeNull();
  });

  it('continues past an empty window at or after the guard year', () => {
    const window = { start: day('2009-06-01'), end: day('2010-06-01') };
    const next = nextWindowEnd(window, false, { kind: 'adaptive', stopYear: 2000, guardYear: 2010 });
    expect(next?.toISOString().slice(0, 10)).toBe('2009-06-01');
  });
});
