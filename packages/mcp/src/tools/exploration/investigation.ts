/**
 * Follow-up steps for a flagged connection, chosen by the tags of the
 * rules it matched
 */

import type { Rule, Severity } from 'sockgraph-core';

export interface MatchReason {
  ruleId: string;
  severity: Severity;
  reason: string;
}

interface StepGroup {
  readonly tags: readonly string[];
  readonly steps: readonly string[];
}

const STEP_GROUPS: readonly StepGroup[] = [
  {
    tags: ['beacon', 'c2'],
    steps: [
      'Check whether connections to the remote recur on a fixed period',
      'Look up the reputation of the remote address',
      'Hash the process binary: sha256sum /proc/<pid>/exe',
    ],
  },
  {
    tags: ['egress'],
    steps: ['Watch the transfer volume to the remote: nethogs or iftop'],
  },
  {
    tags: ['resource-leak', 'connection-churn'],
    steps: ['Review socket totals: ss -s', 'Check the application logs for connections it never closes'],
  },
  {
    tags: ['listener', 'backdoor', 'privileged'],
    steps: [
      'List listening sockets with their owners: ss -tlnp',
      'Confirm the port belongs to an intended service',
      'Review the firewall rules for the port',
    ],
  },
  {
    tags: ['scan', 'retry'],
    steps: ['Check that the peer is up and accepting connections', 'Look for a retry loop in the owning process'],
  },
  {
    tags: ['unattributed'],
    steps: ['Re-run with elevated privileges so the owning process can be found'],
  },
];

export const FALLBACK_STEPS: readonly string[] = [
  'Keep watching the connection state',
  'Check the logs of the related process',
];

export function matchReasons(rules: readonly Rule[]): MatchReason[] {
  return [...rules]
    .sort((a, b) => a.id.localeCompare(b.id))
    .map((rule) => ({ ruleId: rule.id, severity: rule.severity, reason: rule.description || rule.name }));
}

export function investigationSteps(pid: number | undefined, tags: readonly string[]): string[] {
  const steps: string[] = [];
  if (pid !== undefined) {
    steps.push(`Inspect the owning process: ps -p ${pid} -o pid,ppid,user,cmd`);
  }

  const present = new Set(tags);
  for (const group of STEP_GROUPS) {
    if (!group.tags.some((tag) => present.has(tag))) continue;
    for (const step of group.steps) {
      steps.push(pid === undefined ? step : step.replace('<pid>', String(pid)));
    }
  }

  return steps.length > 0 ? steps : [...FALLBACK_STEPS];
}
