/**
 * HTML status page served at `GET /` by the coordinator
 */

import { WorkerStatus, type RegistrySnapshot, type WorkerRecord } from './types.js';

export interface DashboardMeta {
  /** Address the coordinator listens on, shown in the footer */
  listenUrl: string;
  /** Page auto-refresh period in seconds */
  refreshSeconds?: number;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: unknown): string {
  return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** "12s ago", "3m ago" */
export function formatAge(ms: number): string {
  const seconds = Math.max(0, Math.floor(ms / 1000));
  if (seconds < 60) return `${seconds}s ago`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ago`;
  return `${Math.floor(seconds / 3600)}h ago`;
}

function renderWorker(worker: WorkerRecord, now: number): string {
  const online = worker.status === WorkerStatus.Online;
  const host = worker.hostInfo.hostname ?? 'n/a';
  const ip = worker.hostInfo.ip ?? 'n/a';
  return `
    <div class="worker-card ${online ? 'status-online' : 'status-offline'}">
      <div class="worker-header">
        <h3>${escapeHtml(worker.workerId)}</h3>
        <span class="status-badge">${online ? 'online' : 'offline'}</span>
      </div>
      <dl>
        <dt>URL</dt><dd><code>${escapeHtml(worker.baseUrl)}</code></dd>
        <dt>Tools</dt><dd>${escapeHtml(worker.supportedTools.join(', '))}</dd>
        <dt>Active instances</dt><dd class="instance-count">${worker.activeInstanceCount}</dd>
        <dt>Last heartbeat</dt><dd>${formatAge(now - worker.lastHeartbeatAt)}</dd>
        <dt>Host</dt><dd>${escapeHtml(host)} (${escapeHtml(ip)})</dd>
        <dt>Registered</dt><dd>${new Date(worker.registeredAt).toISOString()}</dd>
      </dl>
    </div>`;
}

function renderTools(snapshot: RegistrySnapshot): string {
  const names = new Set([...snapshot.knownTools, ...Object.keys(snapshot.tools)]);
  if (names.size === 0) {
    return '<div class="empty">No tools declared</div>';
  }
  return Array.from(names)
    .sort()
    .map((name) => {
      const available = snapshot.tools[name]?.length ?? 0;
      return `
    <div class="tool-item ${available > 0 ? 'tool-available' : 'tool-unavailable'}">
      <span class="tool-name">${escapeHtml(name)}</span>
      <span class="tool-workers">${available} worker(s) available</span>
    </div>`;
    })
    .join('');
}

export function renderDashboard(snapshot: RegistrySnapshot, meta: DashboardMeta): string {
  const refresh = meta.refreshSeconds ?? 5;
  const toolCount = new Set([...snapshot.knownTools, ...Object.keys(snapshot.tools)]).size;
  const workers =
    snapshot.workers.length > 0
      ? snapshot.workers.map((worker) => renderWorker(worker, snapshot.generatedAt)).join('')
      : '<div class="empty">No workers registered</div>';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta http-equiv="refresh" content="${refresh}">
  <title>Tool fleet coordinator</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 2rem; background: #f6f7f9; color: #1f2328; }
    .summary { display: flex; gap: 1rem; margin-bottom: 2rem; }
    .card { background: #fff; border-radius: 8px; padding: 1rem 1.5rem; box-shadow: 0 1px 3px rgba(0,0,0,.1); }
    .card .value { font-size: 1.8rem; font-weight: 600; }
    .workers { display: grid; grid-template-columns: repeat(auto-fill, minmax(320px, 1fr)); gap: 1rem; }
    .worker-card { background: #fff; border-radius: 8px; padding: 1rem; border-left: 4px solid #2da44e; }
    .worker-card.status-offline { border-left-color: #cf222e; }
    .worker-header { display: flex; justify-content: space-between; align-items: center; }
    dl { display: grid; grid-template-columns: max-content 1fr; gap: .25rem 1rem; }
    dt { font-weight: 600; }
    .tool-item { display: flex; justify-content: space-between; background: #fff; padding: .5rem 1rem; margin: .25rem 0; }
    .tool-unavailable { color: #cf222e; }
    footer { margin-top: 2rem; color: #656d76; font-size: .85rem; }
  </style>
</head>
<body>
  <h1>Tool fleet coordinator</h1>
  <section class="summary">
    <div class="card"><div class="label">Workers online</div><div class="value" id="online-workers">${snapshot.onlineWorkers} / ${snapshot.totalWorkers}</div></div>
    <div class="card"><div class="label">Tools</div><div class="value" id="tool-count">${toolCount}</div></div>
    <div class="card"><div class="label">Active instances</div><div class="value" id="instance-count">${snapshot.totalInstances}</div></div>
  </section>
  <h2>Workers</h2>
  <section class="workers">${workers}
  </section>
  <h2>Tools</h2>
  <section class="tools">${renderTools(snapshot)}
  </section>
  <footer>Coordinator at ${escapeHtml(meta.listenUrl)} · updated ${new Date(snapshot.generatedAt).toISOString()} · refreshes every ${refresh}s</footer>
</body>
</html>
`;
}
