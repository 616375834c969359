/**
 * Terminal operator built on @inquirer/prompts.
 */

import { input, select } from '@inquirer/prompts';

import { OperatorAbortError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';
import type { Operator, ReviewDecision, ReviewRequest } from './operator.js';

export interface PromptChoice {
  name: string;
  value: string;
}

/** The two prompt shapes the operator needs; swapped out in tests. */
export interface PromptFns {
  choose(message: string, choices: PromptChoice[], defaultValue?: string): Promise<string>;
  askName(message: string): Promise<string>;
}

export interface PromptStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/** Prompts rendered on stderr by default so stdout stays pipeable. */
export function createInquirerPrompts(streams: PromptStreams = {}): PromptFns {
  const context = { input: streams.input, output: streams.output ?? process.stderr };
  return {
    choose: (message, choices, defaultValue) => select({ message, choices, default: defaultValue }, context),
    askName: (message) => input({
      message,
      validate: (v) => v.trim().length > 0 || 'Enter a name, or Ctrl+C to abort',
    }, context),
  };
}

const OVERRIDE = 'override';
const SKIP = 'skip';
const CANDIDATE_PREFIX = 'candidate:';

function isPromptExit(err: unknown): boolean {
  return err instanceof Error && (err.name === 'ExitPromptError' || err.name === 'AbortPromptError');
}

export function describeRequest(req: ReviewRequest): string[] {
  return [
    `[LOW] (${req.score}) ${req.item}`,
    `  Query     : ${req.query}`,
    req.suggestion
      ? `  Suggested : ${req.suggestion.canonicalName}  (catalog: ${req.suggestion.alternateName})`
      : '  Suggested : no catalog match',
    `  Threshold : ${req.threshold}`,
    `  Remaining : ${req.remaining}`,
  ];
}

export function buildChoices(req: ReviewRequest): PromptChoice[] {
  const choices: PromptChoice[] = req.candidates.map((c, i) => ({
    name: `[${i + 1}] (${c.score}) ${c.entry.alternateName} -> ${c.entry.canonicalName}`,
    value: `${CANDIDATE_PREFIX}${i}`,
  }));
  choices.push({ name: 'Type a name…', value: OVERRIDE });
  choices.push({ name: 'Skip (leave out of gamelist)', value: SKIP });
  return choices;
}

export class InquirerOperator implements Operator {
  constructor(
    private readonly prompts: PromptFns = createInquirerPrompts(),
    private readonly logger: Logger = createLogger()
  ) {}

  async review(req: ReviewRequest): Promise<ReviewDecision> {
    this.logger.line('');
    for (const line of describeRequest(req)) this.logger.line(line);

    try {
      const choices = buildChoices(req);
      const answer = await this.prompts.choose('Choose', choices, choices[0]?.value);

      if (answer === SKIP) return { kind: 'skip' };
      if (answer === OVERRIDE) {
        const name = (await this.prompts.askName('Canonical name')).trim();
        return name ? { kind: 'override', canonicalName: name } : { kind: 'skip' };
      }
      if (answer.startsWith(CANDIDATE_PREFIX)) {
        return { kind: 'accept', candidate: parseInt(answer.slice(CANDIDATE_PREFIX.length), 10) };
      }
      return { kind: 'skip' };
    } catch (err) {
      if (isPromptExit(err)) throw new OperatorAbortError(undefined, { cause: err });
      throw err;
    }
  }
}
