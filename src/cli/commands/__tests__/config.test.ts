import { describe, it, expect } from 'vitest';
import { createConfigCommand, formatValue } from '../config.js';
import type { CommandContext } from '../../types.js';
import { silentLogger } from '../../../utils/logger.js';

const context: CommandContext = {
  options: { verbose: false, json: false },
  log: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
  createLogger: () => silentLogger,
};

describe('createConfigCommand', () => {
  it('registers its subcommands', () => {
    const command = createConfigCommand(() => context);

    expect(command.commands.map((sub) => sub.name()).sort()).toEqual(['get', 'list', 'path', 'reset', 'set']);
  });
});

describe('formatValue', () => {
  it('prints scalars plainly and the rest as JSON', () => {
    expect(formatValue('ollama')).toBe('ollama');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(64)).toBe('64');
    expect(formatValue(['a', 'b'])).toBe('["a","b"]');
  });
});
