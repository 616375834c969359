import { describe, it, expect } from 'vitest';

import { OperatorAbortError } from '../shared/errors.js';
import { silentLogger } from '../shared/logger.js';
import { buildChoices, InquirerOperator } from './inquirerOperator.js';
import type { PromptChoice, PromptFns } from './inquirerOperator.js';
import type { ReviewRequest } from './operator.js';

const entry = { alternateName: 'Final Fantasy VII', canonicalName: 'Final Fantasy VII' };

const request: ReviewRequest = {
  item: 'Final Fantasy VI.sfc',
  query: 'Final Fantasy VI',
  suggestion: entry,
  score: 58,
  threshold: 80,
  candidates: [{ entry, score: 58, index: 0 }],
  position: 1,
  remaining: 1,
};

function fakePrompts(choice: string | Error, name = ''): PromptFns & { seen: PromptChoice[][] } {
  const seen: PromptChoice[][] = [];
  return {
    seen,
    choose: async (_message, choices) => {
      seen.push(choices);
      if (choice instanceof Error) throw choice;
      return choice;
    },
    askName: async () => name,
  };
}

describe('buildChoices', () => {
  it('lists candidates, then override and skip', () => {
    expect(buildChoices(request)).toEqual([
      { name: '[1] (58) Final Fantasy VII -> Final Fantasy VII', value: 'candidate:0' },
      { name: 'Type a name…', value: 'override' },
      { name: 'Skip (leave out of gamelist)', value: 'skip' },
    ]);
  });
});

describe('InquirerOperator', () => {
  it('maps a candidate choice to accept', async () => {
    const prompts = fakePrompts('candidate:0');
    const op = new InquirerOperator(prompts, silentLogger);
    await expect(op.review(request)).resolves.toEqual({ kind: 'accept', candidate: 0 });
    expect(prompts.seen[0]).toHaveLength(3);
  });

  it('asks for a name on override', async () => {
    const op = new InquirerOperator(fakePrompts('override', '  Final Fantasy VI  '), silentLogger);
    await expect(op.review(request)).resolves.toEqual({ kind: 'override', canonicalName: 'Final Fantasy VI' });
  });

  it('maps skip', async () => {
    const op = new InquirerOperator(fakePrompts('skip'), silentLogger);
    await expect(op.review(request)).resolves.toEqual({ kind: 'skip' });
  });

  it('turns Ctrl+C into an operator abort', async () => {
    const exit = new Error('User force closed the prompt');
    exit.name = 'ExitPromptError';
    const op = new InquirerOperator(fakePrompts(exit), silentLogger);
    await expect(op.review(request)).rejects.toBeInstanceOf(OperatorAbortError);
  });

  it('rethrows other prompt failures', async () => {
    const op = new InquirerOperator(fakePrompts(new Error('tty gone')), silentLogger);
    await expect(op.review(request)).rejects.toThrow('tty gone');
  });
});
