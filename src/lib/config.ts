/**
 * Configuration for the toggle synchronizer
 * Reference timings match the dashboard's manual-classification toggle.
 */

import type { Palette, SyncConfig, SyncConfigOverrides } from '@/types';

export const LOG_PREFIX = '[toggle-sync]';

export const DEFAULT_PALETTE: Palette = {
  yes: {
    background: '#2196F3',
    border: '#2196F3',
    shadow: '0 4px 12px rgba(33, 150, 243, 0.3)'
  },
  no: {
    background: '#E02020',
    border: '#E02020',
    shadow: '0 4px 12px rgba(224, 32, 32, 0.3)'
  }
};

export const DEFAULT_SYNC_CONFIG: SyncConfig = {
  containerSelector: '#manual-map-toggle',
  groupId: 'manual-map-toggle',
  retryIntervalMs: 100,
  maxRetries: null,
  changeDebounceMs: 50,
  postClickReapplyMs: 50,
  reinitDelayMs: 100,
  pollIntervalMs: 2000,
  notificationEvent: 'toggle-sync:change',
  palette: DEFAULT_PALETTE,
  verbose: false
};

/**
 * Derive a group id from a plain id selector ("#foo" → "foo").
 * Anything more complex is returned unchanged.
 */
export function groupIdFromSelector(selector: string): string {
  const trimmed = selector.trim();
  return /^#[\w-]+$/.test(trimmed) ? trimmed.slice(1) : trimmed;
}

/**
 * Merge overrides over the defaults. A key that is absent or explicitly
 * `undefined` keeps its default; `maxRetries: null` is a real value.
 */
export function resolveSyncConfig(overrides: SyncConfigOverrides = {}, doc: Document = document): SyncConfig {
  const defaults = DEFAULT_SYNC_CONFIG;
  const containerSelector = overrides.containerSelector ?? defaults.containerSelector;
  const groupId = overrides.groupId
    ?? (overrides.containerSelector !== undefined ? groupIdFromSelector(containerSelector) : defaults.groupId);

  const config: SyncConfig = {
    containerSelector,
    groupId,
    retryIntervalMs: overrides.retryIntervalMs ?? defaults.retryIntervalMs,
    maxRetries: overrides.maxRetries === undefined ? defaults.maxRetries : overrides.maxRetries,
    changeDebounceMs: overrides.changeDebounceMs ?? defaults.changeDebounceMs,
    postClickReapplyMs: overrides.postClickReapplyMs ?? defaults.postClickReapplyMs,
    reinitDelayMs: overrides.reinitDelayMs ?? defaults.reinitDelayMs,
    pollIntervalMs: overrides.pollIntervalMs ?? defaults.pollIntervalMs,
    notificationEvent: overrides.notificationEvent ?? defaults.notificationEvent,
    palette: { ...DEFAULT_PALETTE, ...(overrides.palette ?? {}) },
    verbose: overrides.verbose ?? defaults.verbose
  };

  validateSyncConfig(config, doc);
  return config;
}

function isValidSelector(selector: string, doc: Document): boolean {
  try {
    doc.createDocumentFragment().querySelector(selector);
    return true;
  } catch {
    return false;
  }
}

export function validateSyncConfig(config: SyncConfig, doc: Document = document): void {
  if (!config.containerSelector.trim()) {
    throw new Error('containerSelector must not be empty');
  }
  if (!isValidSelector(config.containerSelector, doc)) {
    throw new Error('containerSelector is not a valid selector');
  }
  if (!config.groupId.trim()) {
    throw new Error('groupId must not be empty');
  }
  if (!config.notificationEvent.trim()) {
    throw new Error('notificationEvent must not be empty');
  }

  const delays: Array<keyof SyncConfig> = ['changeDebounceMs', 'postClickReapplyMs', 'reinitDelayMs'];
  for (const key of delays) {
    const value = config[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new Error(`${key} must be a finite number >= 0`);
    }
  }

  const intervals: Array<keyof SyncConfig> = ['retryIntervalMs', 'pollIntervalMs'];
  for (const key of intervals) {
    const value = config[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw new Error(`${key} must be a finite number > 0`);
    }
  }

  if (config.maxRetries !== null && (!Number.isInteger(config.maxRetries) || config.maxRetries < 0)) {
    throw new Error('maxRetries must be null or a non-negative integer');
  }
}
