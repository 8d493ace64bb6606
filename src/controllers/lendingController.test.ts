import { describe, it, expect, vi } from 'vitest';
import type { AllowedAuthorization } from '../access/types.js';
import { aggregateDemographics, type HmdaDependencies } from './lendingController.js';
import type { ControllerContext } from './context.js';

const access = { principal: { id: 'ceo_1', role: 'ceo' } } as unknown as AllowedAuthorization;

function routerStub() {
  const aggregate = vi.fn().mockResolvedValue({ kind: 'insufficient_sample', minimumSampleSize: 30 });
  const router = { aggregate, writeIsolated: vi.fn() } as unknown as HmdaDependencies['router'];
  return { aggregate, router };
}

describe('aggregateDemographics', () => {
  it('bounds the aggregate by its own timeout when that is tighter', async () => {
    const { aggregate, router } = routerStub();
    const ctx: ControllerContext = { access, requestId: 'req-1', deadline: 20_000 };

    const response = await aggregateDemographics({ groupBy: ['race'] }, ctx, {
      router,
      aggregateTimeoutMs: 500,
      clock: () => 10_000,
    });

    expect(aggregate).toHaveBeenCalledWith(access, { groupBy: ['race'] }, { requestId: 'req-1', deadline: 10_500 });
    expect(response).toEqual({
      success: true,
      data: { kind: 'insufficient_sample', minimumSampleSize: 30 },
      requestId: 'req-1',
    });
  });

  it('keeps the request deadline when it ends first', async () => {
    const { aggregate, router } = routerStub();
    const ctx: ControllerContext = { access, requestId: 'req-2', deadline: 10_100 };

    await aggregateDemographics({}, ctx, { router, aggregateTimeoutMs: 500, clock: () => 10_000 });

    expect(aggregate.mock.calls[0]?.[2]).toEqual({ requestId: 'req-2', deadline: 10_100 });
  });

  it('passes the request deadline through when no aggregate timeout is set', async () => {
    const { aggregate, router } = routerStub();

    await aggregateDemographics({}, { access, requestId: 'req-3' }, { router });

    expect(aggregate.mock.calls[0]?.[2]).toEqual({ requestId: 'req-3', deadline: undefined });
  });
});
