/**
 * Tests for CLI argument parsing (src/cli-args.ts) and exit codes (src/main.ts).
 */

import { describe, expect, it } from 'vitest';
import { HELP_TEXT, parseCliArgs } from '../../src/cli-args.js';
import { EXIT_BIND_FAILURE, EXIT_FATAL, exitCodeFor } from '../../src/main.js';
import { EngineLaunchError, InvalidConfigError, PortInUseError } from '../../src/utils/errors.js';

describe('parseCliArgs', () => {
  it('defaults to the REST transport', () => {
    expect(parseCliArgs([])).toEqual({ mode: 'rest', configFile: undefined });
  });

  it('selects the MCP transports', () => {
    expect(parseCliArgs(['--mcp']).mode).toBe('mcp-stdio');
    expect(parseCliArgs(['--mcp-http']).mode).toBe('mcp-http');
    expect(parseCliArgs(['--mcp-http', '--mcp']).mode).toBe('mcp-http');
  });

  it('takes a config file in either form', () => {
    expect(parseCliArgs(['--config', 'bridge.json'])).toEqual({ mode: 'rest', configFile: 'bridge.json' });
    expect(parseCliArgs(['--mcp', '--config=bridge.json'])).toEqual({
      mode: 'mcp-stdio',
      configFile: 'bridge.json',
    });
  });

  it('returns help as soon as it is asked for', () => {
    expect(parseCliArgs(['--mcp', '-h'])).toEqual({ mode: 'help' });
    expect(parseCliArgs(['--help', '--bogus'])).toEqual({ mode: 'help' });
  });

  it('rejects unknown arguments and a missing config path', () => {
    expect(() => parseCliArgs(['--bogus'])).toThrow(new InvalidConfigError('unknown argument "--bogus"'));
    expect(() => parseCliArgs(['--config'])).toThrow(InvalidConfigError);
    expect(() => parseCliArgs(['--config', '--mcp'])).toThrow('--config needs a file path');
  });
});

describe('HELP_TEXT', () => {
  it('documents the modes and environment', () => {
    expect(HELP_TEXT).toContain('--mcp-http');
    expect(HELP_TEXT).toContain('--config <file>');
    expect(HELP_TEXT).toContain('BRIDGE_PORT');
    expect(HELP_TEXT).toContain('BRIDGE_ALLOWED_TOOLS');
  });
});

describe('exitCodeFor', () => {
  it('uses 2 for a port in use and 1 otherwise', () => {
    expect(exitCodeFor(new PortInUseError('127.0.0.1', 8931))).toBe(EXIT_BIND_FAILURE);
    expect(exitCodeFor(new EngineLaunchError('x'))).toBe(EXIT_FATAL);
    expect(exitCodeFor(new Error('x'))).toBe(1);
  });
});
