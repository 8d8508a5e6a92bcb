/**
 * Labelled example utterances for the semantic classification stage.
 *
 * Read-only and shared: loaded once from data/intent-examples.json and
 * flattened in category priority order, so iteration order is stable.
 */

import { z } from 'zod';
import { CATEGORY_PRIORITY, type KnownCategory } from '../types/intent.js';
import { defaultBankPath, loadBank } from '../data/load-bank.js';

const ExampleList = z.array(z.string().min(1)).default([]);

export const IntentExampleBankSchema = z.object({
  version: z.number().int(),
  examples: z.object({
    command: ExampleList,
    math: ExampleList,
    code: ExampleList,
    fetch: ExampleList,
    question: ExampleList,
    conversational: ExampleList,
  }),
});

export type IntentExampleBankData = z.infer<typeof IntentExampleBankSchema>;

export interface LabelledExample {
  category: KnownCategory;
  text: string;
}

export const DEFAULT_EXAMPLES_PATH = defaultBankPath('intent-examples.json');

export class IntentExampleBank {
  readonly examples: readonly LabelledExample[];

  constructor(data: IntentExampleBankData) {
    this.examples = CATEGORY_PRIORITY.flatMap((category) =>
      data.examples[category].map((text) => ({ category, text })),
    );
  }

  static load(path: string = DEFAULT_EXAMPLES_PATH): IntentExampleBank {
    return new IntentExampleBank(loadBank(path, IntentExampleBankSchema));
  }

  texts(): string[] {
    return this.examples.map((example) => example.text);
  }

  countsByCategory(): Record<KnownCategory, number> {
    const counts: Record<KnownCategory, number> = {
      command: 0,
      math: 0,
      code: 0,
      fetch: 0,
      question: 0,
      conversational: 0,
    };
    for (const example of this.examples) {
      counts[example.category]++;
    }
    return counts;
  }
}
