import { z } from 'zod';

export const SelectorSchema = z.object({
  locator: z.string(),
  matchText: z.string().optional(),
  stateClass: z.string().optional(),
});

export const SelectorCatalogSchema = z.object({
  tabs: z.object({
    sources: SelectorSchema,
    chat: SelectorSchema,
  }),
  addSourceButton: SelectorSchema,
  pasteTextChip: SelectorSchema,
  pasteTextArea: SelectorSchema,
  insertButton: SelectorSchema,
  allSourcesCheckbox: SelectorSchema,
  queryField: SelectorSchema,
  sendButton: SelectorSchema,
  processingSpinner: SelectorSchema,
  responseBody: SelectorSchema,
});
