export interface Timeouts {
  elementMs: number;
  spinnerMs: number;
  extractionMasterMs: number;
  stabilityDelayMs: number;
  pollIntervalMs: number;
  runMs: number;
}

export interface AutomationConfig {
  url: string;
  headless: boolean;
  profileDir: string;
  runDir: string;
  debug: boolean;
  selectorsPath?: string;
  timeouts: Timeouts;
}
