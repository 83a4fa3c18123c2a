/**
 * Quickwit search index over its ingest API.
 *
 * Documents are sent as NDJSON to POST /api/v1/{index}/ingest. In immediate
 * mode every call forces a commit; in deferred mode Quickwit commits on its
 * own schedule and commit() forces one with an empty ingest at end of run.
 *
 * Ingest only appends. With `replace_existing`, each batch first submits a
 * delete task for its ids; a delete task applies to documents ingested before
 * it, so a replayed batch replaces its earlier copy.
 */

import type { Dispatcher } from 'undici';
import type { SearchIndexConfig } from '../../config/schema.js';
import { joinUrl, requestOk } from '../http.js';
import { PROBE_TIMEOUT_MS } from '../embedder/transport.js';
import type { CommitMode, SearchDocument, SearchSink } from './types.js';

export interface QuickwitOptions {
  dispatcher?: Dispatcher;
}

/** Slack on top of the commit timeout for the HTTP round trip */
const REQUEST_SLACK_MS = 10_000;

/**
 * Delete-task query matching every document whose `id` is one of `ids`.
 */
export function idsQuery(ids: readonly string[]): string {
  return ids.map((id) => `id:"${id.replace(/["\\]/g, '\\$&')}"`).join(' OR ');
}

export class QuickwitIndex implements SearchSink {
  readonly name = 'quickwit';
  readonly indexId: string;
  readonly commitMode: CommitMode;

  constructor(
    private readonly config: SearchIndexConfig,
    private readonly options: QuickwitOptions = {}
  ) {
    this.indexId = config.index_id;
    this.commitMode = config.commit_mode;
  }

  private ingestUrl(commit: 'force' | 'auto'): string {
    const query = `commit=${commit}&commit_timeout_seconds=${this.config.commit_timeout_seconds}`;
    return joinUrl(this.config.url, `/api/v1/${encodeURIComponent(this.indexId)}/ingest?${query}`);
  }

  private async post(body: string, commit: 'force' | 'auto'): Promise<void> {
    await requestOk(this.name, this.ingestUrl(commit), {
      method: 'POST',
      headers: { 'content-type': 'application/x-ndjson' },
      body,
      timeoutMs: this.config.commit_timeout_seconds * 1000 + REQUEST_SLACK_MS,
      dispatcher: this.options.dispatcher,
    });
  }

  private async deleteIds(ids: readonly string[]): Promise<void> {
    await requestOk(this.name, joinUrl(this.config.url, `/api/v1/${encodeURIComponent(this.indexId)}/delete-tasks`), {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ query: idsQuery(ids) }),
      timeoutMs: this.config.commit_timeout_seconds * 1000 + REQUEST_SLACK_MS,
      dispatcher: this.options.dispatcher,
    });
  }

  async ingest(documents: readonly SearchDocument[]): Promise<void> {
    if (documents.length === 0) return;
    if (this.config.replace_existing) {
      await this.deleteIds(documents.map((document) => document.id));
    }
    const body = documents.map((document) => JSON.stringify(document)).join('\n') + '\n';
    await this.post(body, this.commitMode === 'immediate' ? 'force' : 'auto');
  }

  async commit(): Promise<void> {
    if (this.commitMode === 'immediate') return;
    await this.post('', 'force');
  }

  async probe(): Promise<void> {
    await requestOk(this.name, joinUrl(this.config.url, '/health/livez'), {
      method: 'GET',
      timeoutMs: PROBE_TIMEOUT_MS,
      dispatcher: this.options.dispatcher,
    });
  }

  close(): void {
    // stateless HTTP client
  }
}
