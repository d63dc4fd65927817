#!/usr/bin/env tsx

/**
 * Run one pipeline stage.
 *
 * Usage:
 *   tsx scripts/run-pipeline.ts <stage> [--refresh-profiles]
 *   npm run pipeline -- refresh
 *
 * Stages: inventory, refresh, interactions, user-details, classify, all
 * Everything else comes from the environment (see .env.example).
 */

import dotenv from 'dotenv';
import { InventoryPipeline } from '../src/pipeline';
import type { PipelineStage } from '../src/pipeline';
import { loadConfigFromEnv } from '../src/config/env';
import { RunCancelledError } from '../src/utils/errors';

dotenv.config();

const STAGES: readonly PipelineStage[] = ['inventory', 'refresh', 'interactions', 'user-details', 'classify'];

function isStage(value: string): value is PipelineStage {
  return STAGES.some((stage) => stage === value);
}

async function runStage(pipeline: InventoryPipeline, stage: PipelineStage, signal: AbortSignal): Promise<unknown> {
  switch (stage) {
    case 'inventory':
      return pipeline.collectInventory({ signal });
    case 'refresh':
      return pipeline.refreshStats({ signal });
    case 'interactions':
      return pipeline.collectInteractions({ signal });
    case 'user-details':
      return pipeline.collectUserDetails({ signal, refreshProfiles: process.argv.includes('--refresh-profiles') });
    case 'classify':
      return pipeline.classifyUsers({ signal });
  }
}

async function main(): Promise<number> {
  const requested = process.argv[2] ?? 'all';
  const stages = requested === 'all' ? STAGES : isStage(requested) ? [requested] : undefined;

  if (!stages) {
    console.error(`Unknown stage "${requested}". Expected one of: ${STAGES.join(', ')}, all`);
    return 2;
  }

  const pipeline = await InventoryPipeline.init(loadConfigFromEnv());
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    for (const stage of stages) {
      const summary = await runStage(pipeline, stage, controller.signal);
      console.log(JSON.stringify({ stage, summary }));
    }
    return 0;
  } catch (error: unknown) {
    if (error instanceof RunCancelledError) {
      console.error('Cancelled; no partial output was written');
      return 130;
    }
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  } finally {
    await pipeline.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
