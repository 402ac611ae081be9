/**
 * CLI Option Tests
 */

import { describe, it, expect } from 'vitest';
import { CliUsageError, parseArgs } from '../../src/runner/cli-options.js';

describe('parseArgs', () => {
  it('should read every option', () => {
    const options = parseArgs([
      '-c',
      'scenario.json',
      '--overrides',
      'overrides.json',
      '--save',
      '--db',
      'runs.db',
      '--label',
      'trial',
      '--sweep',
      'vessels:10:20',
      '-v',
    ]);

    expect(options).toEqual({
      config: 'scenario.json',
      overrides: 'overrides.json',
      save: true,
      dbPath: 'runs.db',
      label: 'trial',
      sweep: 'vessels:10:20',
      verbose: true,
      help: false,
    });
  });

  it('should take a bare path as the scenario file', () => {
    expect(parseArgs(['scenario.json']).config).toBe('scenario.json');
  });

  it('should not require a config for help', () => {
    const options = parseArgs(['--help']);
    expect(options.help).toBe(true);
    expect(options.config).toBeNull();
  });

  it('should reject missing configs, missing values and unknown flags', () => {
    expect(() => parseArgs([])).toThrow('--config is required');
    expect(() => parseArgs(['--config'])).toThrow('--config needs a value');
    expect(() => parseArgs(['-c', 'a.json', '--db', '--save'])).toThrow('--db needs a value');
    expect(() => parseArgs(['-c', 'a.json', '--fast'])).toThrow(CliUsageError);
    expect(() => parseArgs(['a.json', 'b.json'])).toThrow('Unknown option b.json');
  });
});
