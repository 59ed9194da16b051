import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../../cli-args.js';

describe('parseCliArgs', () => {
  it('starts the editor by default', () => {
    expect(parseCliArgs([])).toEqual({ command: { kind: 'editor' }, songsFile: undefined });
    expect(parseCliArgs(['editor']).command).toEqual({ kind: 'editor' });
  });

  it('recognizes help flags', () => {
    expect(parseCliArgs(['--help']).command).toEqual({ kind: 'help' });
    expect(parseCliArgs(['-h']).command).toEqual({ kind: 'help' });
  });

  it('routes batch flags directly to batch mode', () => {
    expect(parseCliArgs(['--add', 'Amazing Grace', '12']).command).toEqual({
      kind: 'batch',
      args: ['--add', 'Amazing Grace', '12']
    });
  });

  it('strips the --cli prefix', () => {
    expect(parseCliArgs(['--cli', '--list']).command).toEqual({ kind: 'batch', args: ['--list'] });
    expect(parseCliArgs(['--cli']).command).toEqual({ kind: 'batch', args: [] });
  });

  it('reads --file in either form', () => {
    expect(parseCliArgs(['--file', 'hymns.json', '--list'])).toEqual({
      command: { kind: 'batch', args: ['--list'] },
      songsFile: 'hymns.json'
    });
    expect(parseCliArgs(['--file=data/hymns.json', '--cli', 'list']).songsFile).toBe('data/hymns.json');
  });

  it('passes batch arguments through verbatim', () => {
    expect(parseCliArgs(['--add', '--file', '5'])).toEqual({
      command: { kind: 'batch', args: ['--add', '--file', '5'] },
      songsFile: undefined
    });
    expect(parseCliArgs(['--cli', 'add', '--file=x', '5']).command).toEqual({
      kind: 'batch',
      args: ['add', '--file=x', '5']
    });
  });

  it('rejects --file without a path', () => {
    expect(parseCliArgs(['--file']).command).toEqual({ kind: 'invalid', message: '--file requires a path' });
    expect(parseCliArgs(['--file=']).command).toEqual({ kind: 'invalid', message: '--file requires a path' });
  });

  it('reports unknown commands', () => {
    expect(parseCliArgs(['sync']).command).toEqual({ kind: 'unknown', command: 'sync' });
  });
});
