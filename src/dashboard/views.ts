/**
 * Dashboard HTML
 */

import { html } from 'hono/html';
import type { SyncRecord, SyncRun } from '../types/index.js';

export interface StatusPageData {
  running: boolean;
  totalArticles: number;
  totalSyncs: number;
  failedCount: number;
  skippedCount: number;
  automationEnabled: boolean;
  nextScheduledRun: Date | null;
  lastRun: SyncRun | null;
  records: SyncRecord[];
}

function formatDate(date: Date | null | undefined): string {
  return date ? date.toISOString().replace('T', ' ').slice(0, 16) + ' UTC' : 'never';
}

function recordRow(record: SyncRecord) {
  const target = record.remotePostUrl
    ? html`<a href="${record.remotePostUrl}">#${record.remotePostId ?? ''}</a>`
    : html`${record.detail ?? ''}`;

  return html`<tr class="${record.status}">
    <td>${formatDate(record.recordedAt)}</td>
    <td>${record.status}</td>
    <td><a href="${record.sourceUrl}">${record.title ?? record.sourceUrl}</a></td>
    <td>${target}</td>
  </tr>`;
}

export function renderStatusPage(data: StatusPageData) {
  const lastRun = data.lastRun
    ? `${data.lastRun.status} at ${formatDate(data.lastRun.startedAt)}: ${data.lastRun.syncedCount} synced, ${data.lastRun.skippedCount} skipped, ${data.lastRun.errorCount} failed`
    : 'no runs yet';

  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>Medium → WordPress Sync</title>
    <style>
      body { font-family: system-ui, sans-serif; margin: 2rem; color: #222; }
      table { border-collapse: collapse; width: 100%; }
      td, th { border-bottom: 1px solid #ddd; padding: 0.4rem; text-align: left; }
      .failed td { color: #b00020; }
      .skipped td { color: #777; }
      .stats span { margin-right: 1.5rem; }
    </style>
  </head>
  <body>
    <h1>Medium → WordPress Sync</h1>
    <p class="stats">
      <span>Articles: <strong>${data.totalArticles}</strong></span>
      <span>Synced: <strong>${data.totalSyncs}</strong></span>
      <span>Failed: <strong>${data.failedCount}</strong></span>
      <span>Skipped: <strong>${data.skippedCount}</strong></span>
    </p>
    <p>Status: ${data.running ? 'sync running' : 'idle'}</p>
    <p>Automation: ${data.automationEnabled ? `next run ${formatDate(data.nextScheduledRun)}` : 'paused'}</p>
    <p>Last run: ${lastRun}</p>
    <h2>Latest records</h2>
    <table>
      <thead>
        <tr><th>When</th><th>Status</th><th>Article</th><th>Post / reason</th></tr>
      </thead>
      <tbody>
        ${data.records.map(recordRow)}
      </tbody>
    </table>
  </body>
</html>`;
}
