/**
 * Process Correlator
 *
 * Attributes sockets to the processes holding them open. Each call builds
 * a fresh inode -> process index by walking <procRoot>/<pid>/fd and
 * resolving socket:[inode] links, then fills pid/processName on every
 * connection whose inode is in the index.
 *
 * Per-process failures (EACCES, the process exiting mid-walk) skip that
 * process only. On platforms without procfs the call is a no-op.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { silentLogger, type Logger } from '../infrastructure/logger.js';
import { describeFsError } from '../errors/sockgraph-error.js';
import { DEFAULT_PROC_ROOT } from '../scanner/socket-scanner.js';

import type { Connection, ProcessInfo } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CorrelateOptions {
  procRoot?: string;
  logger?: Logger;
  /** Defaults to process.platform */
  platform?: NodeJS.Platform;
  /** Wall-clock budget for the process walk; unset means unbounded */
  budgetMs?: number;
  now?: () => number;
}

export interface CorrelationStats {
  processesScanned: number;
  processesSkipped: number;
  socketsIndexed: number;
  matched: number;
  budgetExceeded: boolean;
}

export interface InodeIndex {
  /** Socket inode -> owning process */
  readonly owners: ReadonlyMap<number, ProcessInfo>;
  readonly stats: CorrelationStats;
}

const SOCKET_LINK = /^socket:\[(\d+)\]$/;
const NUMERIC = /^\d+$/;

function emptyStats(): CorrelationStats {
  return {
    processesScanned: 0,
    processesSkipped: 0,
    socketsIndexed: 0,
    matched: 0,
    budgetExceeded: false,
  };
}

// ============================================================================
// Index
// ============================================================================

async function listPids(procRoot: string, logger: Logger): Promise<number[]> {
  try {
    const entries = await fs.readdir(procRoot);
    return entries
      .filter((entry) => NUMERIC.test(entry))
      .map(Number)
      .sort((a, b) => a - b);
  } catch (error) {
    logger.warn(`Cannot list processes under ${procRoot}`, describeFsError(error));
    return [];
  }
}

/**
 * Socket inodes referenced by one process's descriptor table
 */
async function readSocketInodes(fdDir: string): Promise<number[]> {
  const descriptors = await fs.readdir(fdDir);
  const inodes: number[] = [];

  for (const fd of descriptors) {
    const target = await readLinkOrNull(path.join(fdDir, fd));
    const match = target ? SOCKET_LINK.exec(target) : null;
    if (match?.[1]) {
      inodes.push(Number(match[1]));
    }
  }

  return inodes;
}

async function readLinkOrNull(linkPath: string): Promise<string | null> {
  try {
    return await fs.readlink(linkPath);
  } catch {
    // descriptor closed between readdir and readlink
    return null;
  }
}

async function readProcessName(procRoot: string, pid: number, logger: Logger): Promise<string | undefined> {
  try {
    const comm = await fs.readFile(path.join(procRoot, String(pid), 'comm'), 'utf-8');
    const name = comm.trim();
    return name === '' ? undefined : name;
  } catch (error) {
    logger.debug(`No name for pid ${pid}`, describeFsError(error));
    return undefined;
  }
}

/**
 * Walk the process table once and index every socket-backed descriptor.
 * A socket shared by several processes (inherited across fork) is
 * attributed to the lowest pid.
 */
export async function buildInodeIndex(options: CorrelateOptions = {}): Promise<InodeIndex> {
  const procRoot = options.procRoot ?? DEFAULT_PROC_ROOT;
  const logger = options.logger ?? silentLogger;
  const platform = options.platform ?? process.platform;
  const now = options.now ?? Date.now;
  const stats = emptyStats();
  const owners = new Map<number, ProcessInfo>();

  if (platform !== 'linux') {
    logger.debug(`Process correlation unavailable on ${platform}`);
    return { owners, stats };
  }

  const pids = await listPids(procRoot, logger);
  const deadline = options.budgetMs === undefined ? Infinity : now() + options.budgetMs;

  for (let i = 0; i < pids.length; i++) {
    const pid = pids[i];
    if (pid === undefined) continue;

    if (now() > deadline) {
      stats.budgetExceeded = true;
      stats.processesSkipped += pids.length - i;
      logger.warn(`Correlation budget of ${options.budgetMs}ms exceeded; ${pids.length - i} process(es) not inspected`);
      break;
    }

    let inodes: number[];
    try {
      inodes = await readSocketInodes(path.join(procRoot, String(pid), 'fd'));
    } catch (error) {
      stats.processesSkipped++;
      logger.debug(`Skipping pid ${pid}`, describeFsError(error));
      continue;
    }
    stats.processesScanned++;

    const fresh = inodes.filter((inode) => !owners.has(inode));
    if (fresh.length === 0) continue;

    const name = await readProcessName(procRoot, pid, logger);
    const info: ProcessInfo = name === undefined ? { pid } : { pid, name };
    for (const inode of fresh) {
      owners.set(inode, info);
    }
  }

  stats.socketsIndexed = owners.size;
  return { owners, stats };
}

// ============================================================================
// Correlation
// ============================================================================

/**
 * Fill process fields in place. Connections without a match are left
 * exactly as they were; absence of a pid is the correlation-miss signal.
 */
export async function correlate(
  connections: Connection[],
  options: CorrelateOptions = {}
): Promise<CorrelationStats> {
  const { owners, stats } = await buildInodeIndex(options);

  for (const connection of connections) {
    if (connection.inode === undefined) continue;

    const owner = owners.get(connection.inode);
    if (!owner) continue;

    connection.pid = owner.pid;
    if (owner.name !== undefined) {
      connection.processName = owner.name;
    }
    stats.matched++;
  }

  return stats;
}
