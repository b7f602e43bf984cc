import { beforeEach, describe, expect, it, vi } from 'vitest';

const { mutation, constructed } = vi.hoisted(() => ({
  mutation: vi.fn(),
  constructed: vi.fn(),
}));

vi.mock('convex/browser', () => ({
  ConvexHttpClient: class {
    constructor(url: string) {
      constructed(url);
    }
    mutation = mutation;
  },
}));

import { APPEND_RUN_RECORD, ConvexRecordSink } from './convex.js';

describe('ConvexRecordSink', () => {
  beforeEach(() => {
    mutation.mockReset();
    constructed.mockReset();
  });

  it('sends each entry as a JSON payload', async () => {
    mutation.mockResolvedValue(null);
    const sink = new ConvexRecordSink('https://example.convex.cloud');

    await sink.append('run-1', { kind: 'run_status', status: 'completed' });

    expect(constructed).toHaveBeenCalledWith('https://example.convex.cloud');
    expect(mutation).toHaveBeenCalledWith(
      APPEND_RUN_RECORD,
      expect.objectContaining({
        runId: 'run-1',
        kind: 'run_status',
        payload: '{"kind":"run_status","status":"completed"}',
      }),
    );
  });

  it('rethrows a failed mutation', async () => {
    mutation.mockRejectedValue(new Error('deployment unavailable'));
    const sink = new ConvexRecordSink('https://example.convex.cloud');

    await expect(sink.append('run-1', { kind: 'run_status', status: 'running' })).rejects.toThrow(
      'deployment unavailable',
    );
  });
});
