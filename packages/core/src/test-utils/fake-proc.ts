/**
 * Temporary proc trees for tests: socket tables, fd symlinks and comm files
 * laid out the way the kernel exposes them.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

export type SocketTableFile = 'tcp' | 'tcp6' | 'udp' | 'udp6';

export interface FakeProcess {
  pid: number;
  comm?: string;
  socketInodes?: number[];
  /** Non-socket descriptor targets, e.g. "/dev/null" or "pipe:[77]" */
  otherFds?: string[];
  /** Make the fd directory unreadable (a plain file stands in for it) */
  fdUnreadable?: boolean;
}

export interface FakeProcTree {
  tables?: Partial<Record<SocketTableFile, string[]>>;
  processes?: FakeProcess[];
  /** Extra non-numeric entries at the root, e.g. "net", "self" */
  extraEntries?: string[];
}

const TABLE_HEADER =
  '  sl  local_address rem_address   st tx_queue rx_queue tr tm->when retrnsmt   uid  timeout inode';

/**
 * "127.0.0.1" -> "0100007F"
 */
export function hexIPv4(address: string): string {
  return address
    .split('.')
    .map((octet) => Number(octet).toString(16).toUpperCase().padStart(2, '0'))
    .reverse()
    .join('');
}

export function hexPort(port: number): string {
  return port.toString(16).toUpperCase().padStart(4, '0');
}

/**
 * Build one IPv4 socket table record
 */
export function socketLine(
  slot: number,
  local: [string, number],
  remote: [string, number],
  stateCode: string,
  inode: number
): string {
  const localField = `${hexIPv4(local[0])}:${hexPort(local[1])}`;
  const remoteField = `${hexIPv4(remote[0])}:${hexPort(remote[1])}`;
  return `   ${slot}: ${localField} ${remoteField} ${stateCode} 00000000:00000000 00:00000000 00000000  1000        0 ${inode} 1 0000000000000000 100 0 0 10 0`;
}

/**
 * Build one IPv6 socket table record from raw 32-char address fields
 */
export function socketLine6(
  slot: number,
  localHex: string,
  localPort: number,
  remoteHex: string,
  remotePort: number,
  stateCode: string,
  inode: number
): string {
  return `   ${slot}: ${localHex}:${hexPort(localPort)} ${remoteHex}:${hexPort(remotePort)} ${stateCode} 00000000:00000000 00:00000000 00000000  1000        0 ${inode} 1 0000000000000000 100 0 0 10 0`;
}

export async function createFakeProc(tree: FakeProcTree): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'sockgraph-proc-'));

  await fs.mkdir(path.join(root, 'net'));
  for (const [file, lines] of Object.entries(tree.tables ?? {})) {
    await fs.writeFile(path.join(root, 'net', file), [TABLE_HEADER, ...lines, ''].join('\n'));
  }

  for (const proc of tree.processes ?? []) {
    const procDir = path.join(root, String(proc.pid));
    await fs.mkdir(procDir);

    if (proc.comm !== undefined) {
      await fs.writeFile(path.join(procDir, 'comm'), `${proc.comm}\n`);
    }

    const fdDir = path.join(procDir, 'fd');
    if (proc.fdUnreadable) {
      await fs.writeFile(fdDir, '');
      continue;
    }

    await fs.mkdir(fdDir);
    let fd = 0;
    for (const target of proc.otherFds ?? []) {
      await fs.symlink(target, path.join(fdDir, String(fd++)));
    }
    for (const inode of proc.socketInodes ?? []) {
      await fs.symlink(`socket:[${inode}]`, path.join(fdDir, String(fd++)));
    }
  }

  for (const entry of tree.extraEntries ?? []) {
    await fs.mkdir(path.join(root, entry), { recursive: true });
  }

  return root;
}

export async function removeFakeProc(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}
