import type {
  AutomationConfig,
  ControllerState,
  SelectorCatalog,
  SelectorTestResult,
  Sequence,
  StartDisposition,
  Timeouts,
} from '../types/index.js';
import type { RemoteContext } from '../bridge/remote-context.js';
import { ProbeLibrary } from '../probes/library.js';
import type { AutomationLogger } from '../logging/run-logger.js';
import { silentLogger } from '../logging/run-logger.js';
import { SequenceController } from '../runner/sequence-controller.js';
import type { SequenceCallbacks } from '../runner/sequence-controller.js';
import {
  clickMatchingText,
  clickWhenVisible,
  conditionalClick,
  extractStableText,
  typeText,
  waitForDisappear,
} from '../runner/steps.js';

export const UPLOAD_SEQUENCE = 'upload_transcript';
export const PROMPT_SEQUENCE = 'prompt_insertion';

/**
 * Paste the transcript as a new text source and wait until the notebook has
 * finished processing it.
 */
export function buildUploadSequence(catalog: SelectorCatalog, transcript: string, timeouts: Timeouts): Sequence {
  return {
    name: UPLOAD_SEQUENCE,
    steps: [
      clickMatchingText(catalog.tabs.sources, timeouts.elementMs, { label: 'Open sources tab' }),
      clickWhenVisible(catalog.addSourceButton, timeouts.elementMs, { label: 'Add source' }),
      clickMatchingText(catalog.pasteTextChip, timeouts.elementMs, { label: 'Choose pasted text' }),
      typeText(catalog.pasteTextArea, transcript, timeouts.elementMs, { label: 'Paste transcript' }),
      clickMatchingText(catalog.insertButton, timeouts.elementMs, { label: 'Insert source' }),
      waitForDisappear(catalog.processingSpinner, timeouts.spinnerMs, { label: 'Wait for source processing' }),
    ],
  };
}

/** Select every source, send the prompt and read the answer once it stops growing. */
export function buildPromptSequence(catalog: SelectorCatalog, prompt: string, timeouts: Timeouts): Sequence {
  return {
    name: PROMPT_SEQUENCE,
    steps: [
      clickMatchingText(catalog.tabs.chat, timeouts.elementMs, { label: 'Open chat tab' }),
      conditionalClick(catalog.allSourcesCheckbox, 'unchecked', { label: 'Select all sources' }),
      typeText(catalog.queryField, prompt, timeouts.elementMs, { label: 'Type prompt' }),
      clickWhenVisible(catalog.sendButton, timeouts.elementMs, { label: 'Send prompt' }),
      extractStableText(catalog.responseBody, timeouts.extractionMasterMs, timeouts.stabilityDelayMs, {
        label: 'Extract answer',
      }),
    ],
  };
}

export interface NotebookWorkflowOptions {
  context: RemoteContext;
  catalog: SelectorCatalog;
  config: AutomationConfig;
  callbacks: SequenceCallbacks;
  logger?: AutomationLogger;
  createRequestId?: () => string;
}

/**
 * The two-stage notebook task for one window: upload a transcript, then ask a
 * prompt about it. The prompt stage is chained to the upload stage and is not
 * started separately.
 */
export class NotebookWorkflow {
  private controller: SequenceController;
  private catalog: SelectorCatalog;
  private timeouts: Timeouts;
  private logger: AutomationLogger;
  private prompt: string | null = null;

  constructor(options: NotebookWorkflowOptions) {
    this.catalog = options.catalog;
    this.timeouts = options.config.timeouts;
    this.logger = options.logger ?? silentLogger;
    this.controller = new SequenceController({
      context: options.context,
      callbacks: options.callbacks,
      logger: this.logger,
      probes: new ProbeLibrary({
        debug: options.config.debug,
        pollIntervalMs: options.config.timeouts.pollIntervalMs,
      }),
      chains: { [UPLOAD_SEQUENCE]: () => this.promptStage() },
      createRequestId: options.createRequestId,
    });
  }

  /** Install the bridge bindings. Must run before the page navigates. */
  async attach(): Promise<void> {
    await this.controller.attach();
  }

  submitTranscript(transcript: string, prompt: string): StartDisposition {
    // Upload outcomes may resolve inside start(), so the chained prompt stage
    // must already see this submission's prompt.
    const previous = this.prompt;
    this.prompt = prompt;
    const disposition = this.controller.start(buildUploadSequence(this.catalog, transcript, this.timeouts));
    if (disposition === 'rejected') {
      this.prompt = previous;
    }
    this.logger.log('info', 'transcript_submitted', {
      disposition,
      transcriptChars: transcript.length,
      promptChars: prompt.length,
    });
    return disposition;
  }

  getState(): ControllerState {
    return this.controller.getState();
  }

  getController(): SequenceController {
    return this.controller;
  }

  async testSelector(locator: string): Promise<SelectorTestResult> {
    return this.controller.testSelector(locator);
  }

  async dispose(): Promise<void> {
    this.prompt = null;
    await this.controller.dispose();
  }

  private promptStage(): Sequence {
    return buildPromptSequence(this.catalog, this.prompt ?? '', this.timeouts);
  }
}
