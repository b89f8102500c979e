/**
 * In-process stand-ins for the vendor HTTP APIs.
 */

import { vi } from 'vitest';
import type { FetchFn } from '@mdd/market-data-core';

export interface FakeReply {
  status?: number;
  body: unknown;
  headers?: Record<string, string>;
}

/**
 * fetch that answers replies in order, repeating the last one, and records
 * the requested URLs.
 */
export function scriptedFetch(...replies: FakeReply[]): { fetch: FetchFn; urls: string[] } {
  const urls: string[] = [];
  let call = 0;
  const fetchFn: FetchFn = vi.fn(async (input: Parameters<FetchFn>[0]) => {
    urls.push(String(input));
    const reply = replies[Math.min(call, replies.length - 1)];
    call++;
    if (reply === undefined) {
      throw new Error('no reply scripted');
    }
    const text = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status ?? 200, headers: reply.headers });
  });
  return { fetch: fetchFn, urls };
}

/**
 * Polygon aggregate stamped the way Polygon stamps daily bars (New York
 * midnight, 05:00Z in winter).
 */
export function polygonDaily(day: string, o: number, h: number, l: number, c: number, v: number) {
  return { t: Date.parse(`${day}T05:00:00Z`), o, h, l, c, v, vw: (h + l) / 2, n: 100 };
}

export function polygonMinute(isoMinute: string, o: number, h: number, l: number, c: number, v: number) {
  return { t: Date.parse(isoMinute), o, h, l, c, v };
}
