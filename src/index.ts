export * from './types/index.js';
export * from './schemas/index.js';

export { ProbeLibrary } from './probes/library.js';
export type { DispatchableStep, ProbeLibraryOptions } from './probes/library.js';
export { installProbeRuntime } from './probes/runtime.js';
export { escapeTemplateLiteral, renderLiteral, renderProbeCall } from './probes/template.js';
export { READY_BINDING, REPORT_BINDING, RUNTIME_GLOBAL } from './probes/protocol.js';
export type { ProbeRuntime, ProbeScope } from './probes/protocol.js';

export { Bridge, BridgeNotReadyError } from './bridge/bridge.js';
export type { RemoteContext, Binding } from './bridge/remote-context.js';
export { PlaywrightRemoteContext } from './bridge/playwright-context.js';
export type { PlaywrightPage } from './bridge/playwright-context.js';

export {
  clickMatchingText,
  clickWhenVisible,
  conditionalClick,
  extractStableText,
  isDispatchable,
  typeText,
  validateStep,
  waitForDisappear,
} from './runner/steps.js';
export { CallbackDispatcher } from './runner/callback-dispatcher.js';
export { SequenceController } from './runner/sequence-controller.js';
export type { ChainRules, SequenceCallbacks, SequenceControllerOptions } from './runner/sequence-controller.js';

export {
  NotebookWorkflow,
  PROMPT_SEQUENCE,
  UPLOAD_SEQUENCE,
  buildPromptSequence,
  buildUploadSequence,
} from './workflow/notebook-workflow.js';

export { classifyFailure, formatFailure, isRetryable } from './exception/classifier.js';
export { RunLogger, silentLogger } from './logging/run-logger.js';
export type { AutomationLogger, LogLevel } from './logging/run-logger.js';
export { buildSummaryMarkdown, writeSummary } from './logging/summary-writer.js';
export type { RunOutcome, RunInfo } from './logging/summary-writer.js';
export { DEFAULT_CONFIG, loadAutomationConfig } from './config/loader.js';
export { DEFAULT_CATALOG_PATH, loadSelectorCatalog } from './catalog/loader.js';
