/**
 * Key map for the live view
 */

import type { MonitorStoreApi } from 'sockgraph-core';

export type MonitorCommand =
  | 'stop'
  | 'select-next'
  | 'select-previous'
  | 'toggle-focus'
  | 'ui-faster'
  | 'ui-slower'
  | 'scan-faster'
  | 'scan-slower'
  | 'rescan';

/**
 * Shape of a readline keypress event
 */
export interface KeyPress {
  name?: string | undefined;
  sequence?: string | undefined;
  ctrl?: boolean | undefined;
}

const BY_NAME: Readonly<Record<string, MonitorCommand>> = {
  q: 'stop',
  escape: 'stop',
  up: 'select-previous',
  k: 'select-previous',
  down: 'select-next',
  j: 'select-next',
  p: 'toggle-focus',
  r: 'rescan',
};

const BY_SEQUENCE: Readonly<Record<string, MonitorCommand>> = {
  '+': 'ui-faster',
  '=': 'ui-faster',
  '-': 'ui-slower',
  ']': 'scan-faster',
  '[': 'scan-slower',
};

export function commandForKey(key: KeyPress): MonitorCommand | null {
  if (key.ctrl) {
    return key.name === 'c' ? 'stop' : null;
  }
  if (key.name !== undefined && Object.hasOwn(BY_NAME, key.name)) {
    return BY_NAME[key.name] ?? null;
  }
  if (key.sequence !== undefined && Object.hasOwn(BY_SEQUENCE, key.sequence)) {
    return BY_SEQUENCE[key.sequence] ?? null;
  }
  return null;
}

export function dispatchCommand(store: MonitorStoreApi, command: MonitorCommand): void {
  const actions = store.getState();
  switch (command) {
    case 'stop':
      actions.stop();
      break;
    case 'select-next':
      actions.selectNext();
      break;
    case 'select-previous':
      actions.selectPrevious();
      break;
    case 'toggle-focus':
      actions.toggleFocus();
      break;
    // Faster means a shorter interval
    case 'ui-faster':
      actions.adjustUiInterval(-1);
      break;
    case 'ui-slower':
      actions.adjustUiInterval(1);
      break;
    case 'scan-faster':
      actions.adjustScanInterval(-1);
      break;
    case 'scan-slower':
      actions.adjustScanInterval(1);
      break;
    case 'rescan':
      actions.requestRescan();
      break;
  }
}
