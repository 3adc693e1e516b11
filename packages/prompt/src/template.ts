export interface TemplateSlot {
  name: string;
  required: boolean;
  defaultValue?: string;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

/**
 * Template-based prompt construction
 *
 * Substitution is single-pass: text inserted into one slot is never scanned
 * for further placeholders. Placeholders with no declared slot are left as-is.
 */
export class PromptTemplate {
  private template: string;
  private slots: Map<string, TemplateSlot>;

  constructor(template: string, slots: TemplateSlot[] = []) {
    this.template = template;
    this.slots = new Map(slots.map((slot) => [slot.name, slot]));
  }

  render(values: Record<string, string>): string {
    for (const slot of this.slots.values()) {
      if (slot.required && values[slot.name] === undefined && slot.defaultValue === undefined) {
        throw new Error(`Missing required slot: ${slot.name}`);
      }
    }

    return this.template.replace(PLACEHOLDER, (match, name: string) => {
      const slot = this.slots.get(name);
      if (!slot) return match;
      return values[name] ?? slot.defaultValue ?? match;
    });
  }

  getSlots(): TemplateSlot[] {
    return [...this.slots.values()];
  }
}
