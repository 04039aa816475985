import { describe, test, expect, vi } from 'vitest';
import { parseUtilizationVector, PrometheusUtilizationSource } from './prometheus';

function vector(...series: Array<[Record<string, string>, string]>) {
  return {
    status: 'success',
    data: {
      resultType: 'vector',
      result: series.map(([metric, value]) => ({ metric, value: [1700000000.123, value] })),
    },
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('parseUtilizationVector', () => {
  test('maps series to node utilization', () => {
    const result = parseUtilizationVector(vector([{ Hostname: 'gpu-1' }, '72.5'], [{ Hostname: 'gpu-2' }, '0']));
    expect([...result.entries()]).toEqual([
      ['gpu-1', 72.5],
      ['gpu-2', 0],
    ]);
  });

  test('skips series without the node label or with NaN samples', () => {
    const result = parseUtilizationVector(vector([{ instance: '10.0.0.1:9400' }, '50'], [{ Hostname: 'gpu-1' }, 'NaN']));
    expect(result.size).toBe(0);
  });

  test('reads a custom node label', () => {
    const result = parseUtilizationVector(vector([{ node: 'gpu-9' }, '12']), 'node');
    expect(result.get('gpu-9')).toBe(12);
  });

  test('rejects a non-vector response', () => {
    expect(() => parseUtilizationVector({ status: 'error', error: 'bad query' })).toThrow('Unexpected Prometheus response');
  });
});

describe('PrometheusUtilizationSource', () => {
  test('returns an empty map without a base URL', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const source = new PrometheusUtilizationSource({ fetchImpl });

    expect((await source.getUtilization()).size).toBe(0);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  test('queries the instant query endpoint', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(vector([{ Hostname: 'gpu-1' }, '55'])));
    const source = new PrometheusUtilizationSource({
      baseUrl: 'http://prometheus.test:9090/',
      query: 'avg(up)',
      fetchImpl,
      maxRetries: 0,
    });

    const result = await source.getUtilization();

    expect(result.get('gpu-1')).toBe(55);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('http://prometheus.test:9090/api/v1/query?query=avg(up)');
  });

  test('reports no data when Prometheus fails', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('down', { status: 503, statusText: 'Service Unavailable' }));
    const source = new PrometheusUtilizationSource({ baseUrl: 'http://prometheus.test', fetchImpl, maxRetries: 0 });

    expect((await source.getUtilization()).size).toBe(0);
  });

  test('retries transient failures', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(jsonResponse(vector([{ Hostname: 'gpu-1' }, '40'])));
    const source = new PrometheusUtilizationSource({ baseUrl: 'http://prometheus.test', fetchImpl, maxRetries: 1 });

    vi.useFakeTimers();
    try {
      const pending = source.getUtilization();
      await vi.runAllTimersAsync();
      expect((await pending).get('gpu-1')).toBe(40);
    } finally {
      vi.useRealTimers();
    }
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  test('reports no data for a malformed body', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ status: 'success', data: { resultType: 'matrix', result: [] } }));
    const source = new PrometheusUtilizationSource({ baseUrl: 'http://prometheus.test', fetchImpl, maxRetries: 0 });

    expect((await source.getUtilization()).size).toBe(0);
  });
});
