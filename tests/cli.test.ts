/**
 * Tests for command line parsing
 */

import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/cli.js';
import { ConfigurationError } from '../src/errors.js';

describe('parseArgs', () => {
  it('defaults to service mode', () => {
    expect(parseArgs([])).toEqual({ mode: 'service', type: undefined, sourceId: undefined, force: false });
  });

  it('parses a filtered forced run', () => {
    expect(parseArgs(['--run', '--type=facebook', '--force'])).toEqual({
      mode: 'run',
      type: 'facebook',
      sourceId: undefined,
      force: true,
    });
  });

  it('selects single-source mode from --source', () => {
    expect(parseArgs(['--run', '--source=12'])).toMatchObject({ mode: 'source', sourceId: 12 });
  });

  it('gives seed and status precedence', () => {
    expect(parseArgs(['--run', '--seed']).mode).toBe('seed');
    expect(parseArgs(['--status']).mode).toBe('status');
  });

  it('rejects unknown types and bad ids', () => {
    expect(() => parseArgs(['--type=twitter'])).toThrow(ConfigurationError);
    expect(() => parseArgs(['--source=abc'])).toThrow('Invalid source id "abc"');
  });
});
