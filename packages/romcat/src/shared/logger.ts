import { bold, cyan, green, red, yellow } from 'colorette';

/**
 * Console logger. Everything goes to stderr so stdout stays free for
 * piping; info lines are dropped in quiet mode.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(message: string): void;
  section(title: string): void;
  line(message: string): void;
}

const RULE_WIDTH = 58;

export function sectionRule(title: string): string {
  const head = `── ${title} `;
  return head + '─'.repeat(Math.max(3, RULE_WIDTH - head.length));
}

export function createLogger(opts: { quiet?: boolean; write?: (line: string) => void } = {}): Logger {
  const write = opts.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const quiet = Boolean(opts.quiet);

  return {
    info: (message) => { if (!quiet) write(`${cyan('[INFO]')} ${message}`); },
    warn: (message) => write(`${yellow('[WARN]')} ${message}`),
    error: (message) => write(`${red('[ERR]')} ${message}`),
    success: (message) => write(`${green('✓')} ${message}`),
    section: (title) => write(`\n${bold(sectionRule(title))}`),
    line: (message) => write(message),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  success: () => {},
  section: () => {},
  line: () => {},
};

