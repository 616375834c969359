import { describe, it, expect } from 'vitest';

import { catalogFromPairs } from '../catalog/loader.js';
import { ConfigurationError, OperatorAbortError } from '../shared/errors.js';
import { describeRequest } from './inquirerOperator.js';
import { resolveItems } from './loop.js';
import type { Operator, ReviewDecision, ReviewRequest } from './operator.js';
import { SkipAllOperator } from './operator.js';

/** Answers from a fixed script; fails the test on an unexpected prompt. */
class ScriptedOperator implements Operator {
  readonly requests: ReviewRequest[] = [];

  constructor(private readonly answers: ReviewDecision[] = []) {}

  async review(req: ReviewRequest): Promise<ReviewDecision> {
    this.requests.push(req);
    const answer = this.answers.shift();
    if (!answer) throw new Error(`unexpected prompt for ${req.item}`);
    return answer;
  }
}

const config = (confidenceThreshold: number) => ({ confidenceThreshold, sequenceAware: false, candidateLimit: 6 });

describe('resolveItems', () => {
  it('auto-accepts an exact match without prompting', async () => {
    const operator = new ScriptedOperator();
    const { results, summary } = await resolveItems(
      ['FF7.zip'],
      catalogFromPairs({ ff7: 'Final Fantasy VII' }),
      config(80),
      operator
    );

    expect(operator.requests).toHaveLength(0);
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      item: 'FF7.zip',
      query: 'FF7',
      canonicalName: 'Final Fantasy VII',
      score: 100,
      accepted: true,
      source: 'auto',
    });
    expect(summary).toEqual({ total: 1, autoAccepted: 1, prompted: 0, manuallyAccepted: 0, skipped: 0 });
  });

  it('prompts once for a below-threshold match, showing both titles', async () => {
    const operator = new ScriptedOperator([{ kind: 'skip' }]);
    const { results } = await resolveItems(
      ['Final Fantasy VI.sfc'],
      catalogFromPairs({ 'Final Fantasy VII': 'Final Fantasy VII' }),
      config(80),
      operator
    );

    expect(operator.requests).toHaveLength(1);
    const req = operator.requests[0];
    expect(req.score).toBeLessThan(80);
    expect(req.query).toBe('Final Fantasy VI');
    expect(req.suggestion?.canonicalName).toBe('Final Fantasy VII');

    const shown = describeRequest(req);
    expect(shown[1]).toBe('  Query     : Final Fantasy VI');
    expect(shown[2]).toBe('  Suggested : Final Fantasy VII  (catalog: Final Fantasy VII)');

    expect(results[0]).toMatchObject({ accepted: false, source: 'skipped' });
    expect(results[0].canonicalName).toBeUndefined();
  });

  it('reviews pending items in input order after the matching pass', async () => {
    const catalog = catalogFromPairs({ ff7: 'Final Fantasy VII', alphax: 'Alpha X', betax: 'Beta X' });
    const operator = new ScriptedOperator([
      { kind: 'accept' },
      { kind: 'override', canonicalName: '  Beta Custom ' },
    ]);

    const { results, summary } = await resolveItems(
      ['Alpha.zip', 'ff7.zip', 'Beta.zip'],
      catalog,
      config(100),
      operator
    );

    expect(operator.requests.map(r => [r.item, r.position, r.remaining])).toEqual([
      ['Alpha.zip', 1, 2],
      ['Beta.zip', 2, 1],
    ]);
    expect(results.map(r => [r.item, r.source, r.canonicalName])).toEqual([
      ['Alpha.zip', 'manual', 'Alpha X'],
      ['ff7.zip', 'auto', 'Final Fantasy VII'],
      ['Beta.zip', 'manual', 'Beta Custom'],
    ]);
    expect(summary).toEqual({ total: 3, autoAccepted: 1, prompted: 2, manuallyAccepted: 2, skipped: 0 });
  });

  it('accepts a lower-ranked candidate by index', async () => {
    const operator = new ScriptedOperator([{ kind: 'accept', candidate: 1 }]);
    const { results } = await resolveItems(
      ['Alpha.zip'],
      catalogFromPairs({ alphax: 'Alpha X', betax: 'Beta X' }),
      config(100),
      operator
    );
    expect(operator.requests[0].candidates.map(c => c.entry.canonicalName)).toEqual(['Alpha X', 'Beta X']);
    expect(results[0]).toMatchObject({ source: 'manual', canonicalName: 'Beta X', accepted: true });
  });

  it('always asks when there is no suggestion, even at threshold 0', async () => {
    const operator = new ScriptedOperator([{ kind: 'accept' }]);
    const { results } = await resolveItems(['xyz.bin'], catalogFromPairs({ abc: 'ABC' }), config(0), operator);

    expect(operator.requests).toHaveLength(1);
    expect(operator.requests[0].suggestion).toBeUndefined();
    expect(operator.requests[0].score).toBe(0);
    expect(results[0].source).toBe('skipped');
  });

  it('treats an empty override as a skip', async () => {
    const operator = new ScriptedOperator([{ kind: 'override', canonicalName: '   ' }]);
    const { results } = await resolveItems(['Alpha.zip'], catalogFromPairs({ alphax: 'Alpha X' }), config(100), operator);
    expect(results[0]).toMatchObject({ source: 'skipped', accepted: false });
  });

  it('fails on an empty catalog before any prompt', async () => {
    const operator = new ScriptedOperator();
    await expect(resolveItems(['a.zip'], catalogFromPairs({}), config(80), operator))
      .rejects.toBeInstanceOf(ConfigurationError);
    expect(operator.requests).toHaveLength(0);
  });

  it('fails when there are no input items', async () => {
    await expect(resolveItems([], catalogFromPairs({ a: 'A' }), config(80), new ScriptedOperator()))
      .rejects.toThrow('No input items provided');
  });

  it('rejects an out-of-range threshold', async () => {
    await expect(resolveItems(['a.zip'], catalogFromPairs({ a: 'A' }), config(101), new ScriptedOperator()))
      .rejects.toBeInstanceOf(ConfigurationError);
  });

  it('propagates an operator abort', async () => {
    const operator: Operator = {
      review: async () => { throw new OperatorAbortError(); },
    };
    await expect(resolveItems(['Alpha.zip'], catalogFromPairs({ alphax: 'Alpha X' }), config(100), operator))
      .rejects.toBeInstanceOf(OperatorAbortError);
  });

  it('skips every pending item with SkipAllOperator', async () => {
    const { summary } = await resolveItems(
      ['Alpha.zip', 'ff7.zip'],
      catalogFromPairs({ ff7: 'Final Fantasy VII', alphax: 'Alpha X' }),
      config(95),
      new SkipAllOperator()
    );
    expect(summary).toEqual({ total: 2, autoAccepted: 1, prompted: 1, manuallyAccepted: 0, skipped: 1 });
  });
});
