/**
 * Text rendering for snapshots and the live view
 */

import chalk from 'chalk';
import {
  CONNECTION_STATES,
  recentlyChanged,
  selectSelectedConnection,
  type Connection,
  type Endpoint,
  type Graph,
  type GraphSummary,
  type MonitorStoreState,
  type Severity,
  type SocketAddress,
  type Visibility,
} from 'sockgraph-core';

const ADDRESS_WIDTH = 21;
const ENDPOINT_WIDTH = 39;

export function formatSocketAddress(socket: SocketAddress): string {
  return socket.address.includes(':') ? `[${socket.address}]:${socket.port}` : `${socket.address}:${socket.port}`;
}

export function formatProcess(connection: Connection): string {
  if (connection.pid === undefined) return '-';
  return `${connection.processName ?? ''}[${connection.pid}]`;
}

export function formatConnection(connection: Connection): string {
  return [
    connection.protocol,
    formatSocketAddress(connection.local).padEnd(ADDRESS_WIDTH),
    (connection.remote ? formatSocketAddress(connection.remote) : '*').padEnd(ADDRESS_WIDTH),
    connection.state.padEnd(12),
    formatProcess(connection),
  ].join(' ');
}

export function severityBadge(severity: Severity | null): string {
  switch (severity) {
    case 'critical':
      return chalk.red.bold('[CRITICAL]');
    case 'high':
      return chalk.red('[HIGH]');
    case 'medium':
      return chalk.yellow('[MEDIUM]');
    case 'low':
      return chalk.cyan('[LOW]');
    default:
      return '';
  }
}

export function formatEndpoint(endpoint: Endpoint): string {
  const line = [
    endpoint.heavyTalker ? '*' : ' ',
    endpoint.address.padEnd(ENDPOINT_WIDTH),
    String(endpoint.connectionCount).padStart(4),
    endpoint.dominantState.padEnd(12),
    endpoint.locality.padEnd(11),
    endpoint.latency.padEnd(7),
  ].join(' ');
  const badge = severityBadge(endpoint.severity);
  return badge ? `${line} ${badge}` : line.trimEnd();
}

export function formatSummary(summary: GraphSummary, dropped: number): string[] {
  const lines = [
    `connections ${summary.totalConnections}  listening ${summary.listenCount}  ` +
      `endpoints ${summary.endpointCount}  suspicious ${summary.suspiciousCount}`,
  ];

  const states = CONNECTION_STATES.filter((state) => summary.stateCounts[state] > 0).map(
    (state) => `${state} ${summary.stateCounts[state]}`
  );
  if (states.length > 0) {
    lines.push(chalk.gray(states.join(', ')));
  }
  if (dropped > 0) {
    lines.push(chalk.gray(`+${dropped} more endpoint(s) not shown`));
  }
  if (summary.matchedTags.length > 0) {
    lines.push(`tags: ${summary.matchedTags.join(', ')}`);
  }
  return lines;
}

export function visibilityNotice(visibility: Visibility): string | null {
  switch (visibility) {
    case 'none':
      return chalk.yellow('No socket tables readable: insufficient access or unsupported platform');
    case 'limited':
      return chalk.yellow('Some processes could not be inspected; process attribution is partial');
    default:
      return null;
  }
}

export function formatCenter(graph: Graph): string {
  return graph.center.kind === 'host'
    ? `host ${graph.center.label}`
    : `process ${graph.center.label} [${graph.center.pid}]`;
}

export function formatGraph(graph: Graph): string[] {
  const lines = [chalk.bold(formatCenter(graph)), ...formatSummary(graph.summary, graph.dropped)];
  if (graph.endpoints.length > 0) {
    lines.push('');
    lines.push(...graph.endpoints.map(formatEndpoint));
  }
  return lines;
}

const SPARK_LEVELS = '▁▂▃▄▅▆▇█';

/**
 * One bar per activity score (0..100)
 */
export function sparkline(values: readonly number[]): string {
  const top = SPARK_LEVELS.length - 1;
  return values
    .map((value) => SPARK_LEVELS[Math.min(top, Math.max(0, Math.ceil((value / 100) * SPARK_LEVELS.length) - 1))])
    .join('');
}

/**
 * One screen of the live view
 */
export function formatFrame(state: MonitorStoreState, maxRows: number, now: number = Date.now()): string[] {
  const { refresh, graph } = state;
  const pulse = refresh.blink ? chalk.green('●') : chalk.gray('○');
  const intervals = `ui ${refresh.uiIntervalMs}ms  scan ${refresh.scanIntervalMs}ms`;
  const lines = [
    `${pulse} ${chalk.bold('sockgraph')}  ${refresh.mode === 'process' ? `focus pid ${refresh.focusedPid ?? '?'}` : 'host'}  ` +
      (recentlyChanged(refresh.lastIntervalChangeAt, now)
        ? chalk.yellow.bold.underline(intervals) + chalk.yellow(' (changed)')
        : chalk.gray(intervals)),
    chalk.gray('═'.repeat(50)),
  ];

  if (state.activityHistory.length > 0) {
    lines.push(`activity ${chalk.green(sparkline(state.activityHistory))}`);
  }

  const notice = visibilityNotice(state.visibility);
  if (notice) lines.push(notice);

  if (!graph) {
    lines.push(chalk.gray('Scanning...'));
    return lines;
  }

  lines.push(...formatGraph(graph));
  lines.push('');

  const selected = selectSelectedConnection(state);
  const rows = state.visibleConnections.slice(0, Math.max(0, maxRows));
  for (const connection of rows) {
    const marker = connection === selected ? chalk.cyan('>') : ' ';
    lines.push(`${marker} ${formatConnection(connection)}`);
  }
  if (state.visibleConnections.length > rows.length) {
    lines.push(chalk.gray(`  ... ${state.visibleConnections.length - rows.length} more`));
  }

  lines.push('');
  lines.push(chalk.gray('q quit  ↑/↓ select  p focus  +/- ui speed  ]/[ scan speed  r rescan'));
  return lines;
}
