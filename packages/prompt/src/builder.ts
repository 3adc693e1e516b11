import type { GroundedState } from '@hexgate/core';
import { PromptTemplate } from './template.js';
import { ConstraintAdapter } from './constraint-adapter.js';

export const PROTOCOL_HEADER = '[SYSTEM_PROTOCOL_OVERRIDE]';

export const DEFAULT_MANDATE =
  'Respond to the query while STRICTLY adhering to the Physics Constraint. ' +
  'If resources are low, advise conservation. If risks are high, advise caution.';

export const PAYLOAD_TEMPLATE =
  '{{header}}\n{{constraints}}\nUser Query: {{query}}\nMandate: {{mandate}}\n';

export interface PayloadBuilderConfig {
  header?: string;
  mandate?: string;
}

/**
 * Builds the constraint-annotated payload that replaces the original text
 */
export class PayloadBuilder {
  private config: Required<PayloadBuilderConfig>;
  private adapter: ConstraintAdapter;
  private template: PromptTemplate;

  constructor(config: PayloadBuilderConfig = {}) {
    this.config = {
      header: PROTOCOL_HEADER,
      mandate: DEFAULT_MANDATE,
      ...config,
    };
    this.adapter = new ConstraintAdapter();
    this.template = new PromptTemplate(PAYLOAD_TEMPLATE, [
      { name: 'header', required: true },
      { name: 'constraints', required: true },
      { name: 'query', required: true },
      { name: 'mandate', required: true },
    ]);
  }

  build(state: GroundedState, query: string): string {
    return this.template.render({
      header: this.config.header,
      constraints: this.adapter.toPreamble(state),
      query,
      mandate: this.config.mandate,
    });
  }
}
