// src/connectors/types.ts

import type { InventorySourceName } from '../config/ConfigValidator';
import type { InventoryEntry } from '../core/inventory/types';
import type { HttpCore } from '../core/http/HttpCore';
import type { GitHubClient } from '../clients/github/GitHubClient';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';

export interface Connector {
  readonly name: InventorySourceName;

  fetch(params?: FetchParams): Promise<InventoryEntry[]>;
}

export interface FetchParams {
  signal?: AbortSignal;
}

export interface CoreDeps {
  http: HttpCore;
  github: GitHubClient;
  logger: Logger;
  metrics: MetricsCollector;
}
