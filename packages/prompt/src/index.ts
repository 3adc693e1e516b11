/**
 * @hexgate/prompt - Payload construction for grounded prompts
 */
export {
  PayloadBuilder,
  PROTOCOL_HEADER,
  DEFAULT_MANDATE,
  PAYLOAD_TEMPLATE,
  type PayloadBuilderConfig,
} from './builder.js';
export { PromptTemplate, type TemplateSlot } from './template.js';
export { ConstraintAdapter } from './constraint-adapter.js';
