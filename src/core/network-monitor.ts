/**
 * Network Monitor - ring buffer of document, xhr and fetch traffic
 */

import type { Page, Request } from 'playwright';
import type { NetworkCall, NetworkQuery } from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.network;

export const TRACKED_RESOURCE_TYPES = new Set(['document', 'xhr', 'fetch']);

export class NetworkMonitor {
  private readonly events: NetworkCall[] = [];
  private readonly inFlight = new Map<Request, NetworkCall>();

  constructor(
    private readonly maxEvents: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Append a call, dropping the oldest once the buffer is full.
   */
  record(call: NetworkCall): void {
    if (!TRACKED_RESOURCE_TYPES.has(call.resourceType)) return;
    this.events.push(call);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }
  }

  /**
   * Start timing a call; the returned callback completes it.
   */
  begin(url: string, method: string, resourceType: string): (status: number | null) => void {
    const startedAt = this.now();
    return (status) => {
      this.record({ url, method, status, resourceType, startedAt, durationMs: this.now() - startedAt });
    };
  }

  /**
   * Listen to a Playwright page. Calls are recorded when they finish or fail.
   */
  attach(page: Page): void {
    page.on('request', (request) => {
      if (!TRACKED_RESOURCE_TYPES.has(request.resourceType())) return;
      this.inFlight.set(request, {
        url: request.url(),
        method: request.method(),
        status: null,
        resourceType: request.resourceType(),
        startedAt: this.now(),
        durationMs: null,
      });
    });

    page.on('requestfinished', (request) => {
      const call = this.inFlight.get(request);
      if (!call) return;
      this.inFlight.delete(request);
      request
        .response()
        .then((response) => {
          this.record({ ...call, status: response?.status() ?? null, durationMs: this.now() - call.startedAt });
        })
        .catch((error: unknown) => {
          log.debug('Response unavailable for finished request', { url: call.url, error: String(error) });
          this.record({ ...call, durationMs: this.now() - call.startedAt });
        });
    });

    page.on('requestfailed', (request) => {
      const call = this.inFlight.get(request);
      if (!call) return;
      this.inFlight.delete(request);
      this.record({ ...call, durationMs: this.now() - call.startedAt });
    });
  }

  list(query: NetworkQuery = {}): NetworkCall[] {
    let calls = this.events;
    if (query.resourceTypes && query.resourceTypes.length > 0) {
      const types = new Set(query.resourceTypes);
      calls = calls.filter((call) => types.has(call.resourceType));
    }
    if (query.urlContains) {
      const needle = query.urlContains;
      calls = calls.filter((call) => call.url.includes(needle));
    }
    if (query.limit !== undefined && query.limit > 0) {
      calls = calls.slice(-query.limit);
    }
    return calls.map((call) => ({ ...call }));
  }

  get size(): number {
    return this.events.length;
  }

  clear(): void {
    this.events.length = 0;
    this.inFlight.clear();
  }
}
