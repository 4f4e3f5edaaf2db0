export interface Selector {
  locator: string;
  matchText?: string;
  stateClass?: string;
}

export interface SelectorCatalog {
  tabs: {
    sources: Selector;
    chat: Selector;
  };
  addSourceButton: Selector;
  pasteTextChip: Selector;
  pasteTextArea: Selector;
  insertButton: Selector;
  allSourcesCheckbox: Selector;
  queryField: Selector;
  sendButton: Selector;
  processingSpinner: Selector;
  responseBody: Selector;
}
