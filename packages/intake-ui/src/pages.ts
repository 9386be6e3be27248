// ============================================================================
// Intake pages: server-rendered HTML for the triage form and its result
// ============================================================================

import type { ClassificationResult } from '@triage/support';

export interface IntakePageState {
  apiBase: string;
  backendAlive: boolean;
  clientId?: string;
  ticket?: string;
  warning?: string;
  error?: string;
  result?: ClassificationResult;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderIntakePage(state: IntakePageState): string {
  return layout('Ticket Triage', `
    ${statusBanner(state)}
    <section>
      <form method="POST" action="/">
        <label for="client_id">Client ID</label>
        <input id="client_id" name="client_id" value="${escapeHtml(state.clientId ?? '')}" placeholder="e.g. acme-corp">
        <p class="muted hint">Unique ID of the user raising the ticket</p>
        <label for="ticket">Enter your support ticket:</label>
        <textarea id="ticket" name="ticket" rows="7" placeholder="Describe the issue reported by the customer...">${escapeHtml(state.ticket ?? '')}</textarea>
        <div class="actions">
          <button type="submit" class="btn btn-primary"${state.backendAlive ? '' : ' disabled'}>Classify Ticket</button>
        </div>
      </form>
    </section>
    ${state.warning ? `<p class="notice warning">${escapeHtml(state.warning)}</p>` : ''}
    ${state.error ? `<p class="notice error">${escapeHtml(state.error)}</p>` : ''}
    ${state.result ? resultSection(state.result) : ''}
  `);
}

function statusBanner(state: IntakePageState): string {
  const api = escapeHtml(state.apiBase);
  if (state.backendAlive) {
    return `<p class="notice success">Connected to ${api}</p>`;
  }
  return `<p class="notice error">Cannot reach API at ${api}. Start it with <code>npm run start:api</code>.</p>`;
}

function resultSection(result: ClassificationResult): string {
  const rows: Array<[string, string]> = [
    ['Client ID', result.client_id],
    ['Summary', result.summary],
    ['Full LLM Summary (Corrected)', result.full_summary ?? 'No full summary available'],
    ['Full Ticket Text', result.full_text],
    ['Category', result.category],
    ['Severity', result.severity],
    ['KB Match', result.kb_match],
    ['Next Step', result.next_step],
    ['Analysis Source', result.analysis_source],
  ];

  return `
    <section>
      <h2>Ticket Classification Result</h2>
      <dl>
        ${rows.map(([label, value]) => `<dt>${label}</dt><dd class="${label === 'Severity' ? `severity-${value.toLowerCase()}` : ''}">${escapeHtml(value)}</dd>`).join('')}
      </dl>
      <h3>Raw LLM Output</h3>
      <pre>${escapeHtml(result.llm_raw ? JSON.stringify(result.llm_raw, null, 2) : 'No model output (heuristic classification)')}</pre>
    </section>
  `;
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width,initial-scale=1">
<title>${title}</title>
<style>
*{box-sizing:border-box;margin:0;padding:0}
body{font-family:system-ui,-apple-system,sans-serif;background:#0f172a;color:#f9fafb;line-height:1.6;padding:1rem;max-width:800px;margin:0 auto}
h1{font-size:1.5rem;margin-bottom:0.5rem}
h2{font-size:1.2rem;margin-bottom:1rem}
h3{font-size:1rem;margin:1rem 0 0.5rem}
section{margin-bottom:2rem;padding:1.5rem;background:#020617;border-radius:0.75rem;border:1px solid #1f2937}
label{display:block;font-size:0.875rem;margin-bottom:0.25rem;color:#e5e7eb}
input,textarea{width:100%;border-radius:0.5rem;border:1px solid #374151;background:#020617;color:#f9fafb;padding:0.5rem 0.75rem;font-size:0.95rem;margin-bottom:0.5rem}
.hint{font-size:0.8rem;margin-bottom:1rem}
.muted{color:#9ca3af}
.btn{display:inline-block;padding:0.6rem 1.2rem;border:none;border-radius:999px;font-size:0.95rem;cursor:pointer;font-weight:600}
.btn:disabled{opacity:0.6;cursor:default}
.btn-primary{background:#4f46e5;color:#fff}
.actions{margin-top:1rem}
.notice{padding:0.75rem 1rem;border-radius:0.5rem;margin-bottom:1rem}
.success{background:#052e16;color:#86efac}
.warning{background:#422006;color:#fde68a}
.error{background:#450a0a;color:#fca5a5}
dl{display:grid;grid-template-columns:auto 1fr;gap:0.5rem 1rem}
dt{color:#9ca3af;font-weight:600}
.severity-critical{color:#ef4444;font-weight:700}
.severity-high{color:#f97316;font-weight:700}
.severity-medium{color:#eab308}
.severity-low{color:#22c55e}
pre{background:#0b1120;border-radius:0.5rem;padding:0.9rem 1rem;overflow-x:auto;font-size:0.85rem;border:1px solid #1f2937}
header{margin-bottom:1.5rem;padding-bottom:1rem;border-bottom:1px solid #1f2937}
</style>
</head>
<body>
<header>
  <h1>AI Ticket Triage System</h1>
  <p class="muted">Paste a support ticket and get category, severity, next steps, and KB match.</p>
</header>
${body}
</body>
</html>`;
}
