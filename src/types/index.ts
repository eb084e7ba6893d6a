/**
 * Toggle Sync Type Definitions
 *
 * Shapes shared by the locator, presentation applier, interaction bridge,
 * watchdog and debug tools.
 */

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface PaletteEntry {
  background: string;
  border: string;
  shadow: string;
}

export type Palette = Record<string, PaletteEntry>;

export interface SyncConfig {
  containerSelector: string;
  groupId: string;
  retryIntervalMs: number;
  maxRetries: number | null;   // null = keep polling forever
  changeDebounceMs: number;
  postClickReapplyMs: number;
  reinitDelayMs: number;
  pollIntervalMs: number;
  notificationEvent: string;
  palette: Palette;
  verbose: boolean;
}

export type SyncConfigOverrides = Partial<Omit<SyncConfig, 'palette'>> & {
  palette?: Palette;
};

// =============================================================================
// CONTROL GROUP
// =============================================================================

export interface ToggleOption {
  control: HTMLInputElement;
  label: HTMLLabelElement;
  value: string;
}

/** Inline declarations keyed by CSS property name (kebab-case). */
export type StyleDeclarations = Record<string, string>;

export type SyncState = 'idle' | 'locating' | 'ready' | 'failed';

export interface ToggleChangeDetail {
  groupIdentifier: string;
  selectedValue: string;
}

export type BroadcastTarget = 'control' | 'container' | 'document';

export interface BroadcastSignal {
  type: string;
  target: BroadcastTarget;
  composed?: boolean;
}

// =============================================================================
// DEBUG SURFACE
// =============================================================================

export interface ControlSnapshot {
  value: string;
  checked: boolean;
  hidden: boolean;
}

export interface LabelSnapshot {
  value: string | null;
  state: string | null;
  background: string;
  color: string;
}

export interface ToggleStateDump {
  state: SyncState;
  containerFound: boolean;
  controls: ControlSnapshot[];
  labels: LabelSnapshot[];
}

export interface SelfTestStep {
  value: string;
  /** false when the option was already checked, so no notification was due */
  changed: boolean;
  notified: boolean;
  checked: boolean;
  labelSelected: boolean;
  passed: boolean;
}

export interface SelfTestReport {
  passed: boolean;
  reason: string | null;
  steps: SelfTestStep[];
}
