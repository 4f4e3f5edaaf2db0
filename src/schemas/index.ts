export { SelectorSchema, SelectorCatalogSchema } from './selector.schema.js';
export { OutcomeStatusSchema, StepOutcomeSchema, SelectorTestResultSchema } from './outcome.schema.js';
export { TimeoutsSchema, AutomationConfigSchema } from './config.schema.js';
