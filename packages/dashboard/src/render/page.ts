import { html, raw } from "hono/html";
import type { HtmlEscapedString } from "hono/utils/html";
import type { Board, BoardItem, BoardSection } from "../tickets/board.ts";
import { VIEW_SLUGS, VIEWS } from "../tickets/views.ts";

type Html = HtmlEscapedString | Promise<HtmlEscapedString>;

export interface PageOptions {
  /** Kiosk mode: no navigation, no agent filter. */
  display: boolean;
  autoRefreshSeconds: number;
}

const STYLES = `
  body { font-family: system-ui, sans-serif; margin: 0; background: #111827; color: #e5e7eb; }
  header { display: flex; gap: 1rem; align-items: center; padding: .75rem 1rem; background: #1f2937; }
  header nav a { color: #93c5fd; margin-right: .75rem; text-decoration: none; }
  header nav a.current { color: #fff; font-weight: 600; }
  main { padding: 1rem; display: grid; gap: 1.5rem; }
  h2 { margin: 0 0 .5rem; font-size: 1.1rem; }
  h2 .count { color: #9ca3af; font-weight: 400; }
  table { width: 100%; border-collapse: collapse; font-size: .9rem; }
  th, td { text-align: left; padding: .35rem .5rem; border-bottom: 1px solid #374151; }
  a { color: #93c5fd; }
  .empty { color: #6b7280; font-style: italic; }
  .error { background: #7f1d1d; padding: .5rem 1rem; }
  .sla-overdue { color: #f87171; font-weight: 600; }
  .sla-critical { color: #fb923c; font-weight: 600; }
  .sla-warning { color: #facc15; }
  .sla-normal, .sla-responded { color: #86efac; }
  .sla-in-progress { color: #93c5fd; }
  .sla-none { color: #9ca3af; }
  body.display { font-size: 1.2rem; }
`;

function ticketId(item: BoardItem): Html {
  return item.url
    ? html`<a href="${item.url}" target="_blank" rel="noopener">#${item.id}</a>`
    : html`#${item.id}`;
}

function ticketRow(item: BoardItem): Html {
  return html`<tr class="ticket" data-id="${item.id}">
      <td>${ticketId(item)}</td>
      <td title="${item.descriptionText}">${item.subject}</td>
      <td>${item.requesterName}</td>
      <td>${item.agentName}</td>
      <td>${item.priorityText}</td>
      <td class="${item.slaClass}">${item.slaText}</td>
      <td>${item.updatedFriendly}</td>
      <td>${item.createdDaysOld}</td>
    </tr>`;
}

function section(index: number, entry: BoardSection): Html {
  const body = entry.items.length === 0
    ? html`<p class="empty">No tickets</p>`
    : html`<table>
        <thead>
          <tr>
            <th>ID</th><th>Subject</th><th>Requester</th><th>Agent</th>
            <th>Priority</th><th>SLA / Status</th><th>Updated</th><th>Age</th>
          </tr>
        </thead>
        <tbody>${entry.items.map(ticketRow)}</tbody>
      </table>`;
  return html`<section id="s${index}" data-bucket="${entry.bucket}">
      <h2>${entry.name} <span class="count">(${entry.items.length})</span></h2>
      ${body}
    </section>`;
}

function navigation(board: Board): Html {
  const views = VIEW_SLUGS.map((slug) =>
    html`<a href="/${slug}" class="${
      slug === board.view ? "current" : ""
    }">${VIEWS[slug]}</a>`
  );
  const options = board.agents.map((agent) =>
    html`<option value="${agent.id}" ${
      agent.id === board.selectedAgentId ? raw("selected") : ""
    }>${agent.name}</option>`
  );
  return html`<nav>${views}</nav>
    <form method="get" action="/${board.view}">
      <select name="agent_id" onchange="this.form.submit()">
        <option value="">All agents</option>
        ${options}
      </select>
    </form>`;
}

export function renderBoardPage(board: Board, options: PageOptions): Html {
  const title = `${board.viewName} Tickets`;
  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta http-equiv="refresh" content="${options.autoRefreshSeconds}">
    <title>${title}</title>
    <style>${raw(STYLES)}</style>
  </head>
  <body class="${options.display ? "display" : "dashboard"}">
    <header>
      <strong>${title}</strong>
      ${options.display ? "" : navigation(board)}
      <span>
        ${board.total} active &middot; updated
        <time datetime="${board.generatedAt}">${board.generatedAt}</time>
      </span>
    </header>
    ${
    board.sourceError
      ? html`<p class="error">Ticket source unavailable: ${board.sourceError}</p>`
      : ""
  }
    <main>
      ${board.sections.map((entry, index) => section(index + 1, entry))}
    </main>
  </body>
</html>`;
}
