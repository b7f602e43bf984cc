import { ConvexHttpClient } from 'convex/browser';
import { makeFunctionReference } from 'convex/server';
import type { PersistedEntry, RecordSink } from '../bridges/capabilities.js';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';

type AppendArgs = {
  runId: string;
  kind: PersistedEntry['kind'];
  payload: string;
  createdAt: number;
};

export const APPEND_RUN_RECORD = makeFunctionReference<'mutation', AppendArgs, null>('runRecords:append');

/**
 * Record sink that forwards every persisted entry to a Convex deployment.
 * The entry travels as a JSON string so the deployment's table needs no
 * schema for the nested record shapes.
 */
export class ConvexRecordSink implements RecordSink {
  private readonly client: ConvexHttpClient;

  constructor(deploymentUrl?: string) {
    const url = deploymentUrl || config.convex.deploymentUrl;
    if (!url) {
      throw new Error('Convex deployment URL not configured');
    }
    this.client = new ConvexHttpClient(url);
  }

  async append(runId: string, entry: PersistedEntry): Promise<void> {
    try {
      await this.client.mutation(APPEND_RUN_RECORD, {
        runId,
        kind: entry.kind,
        payload: JSON.stringify(entry),
        createdAt: Date.now(),
      });
    } catch (error) {
      logger.error('Failed to append run record to Convex', {
        runId,
        kind: entry.kind,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
