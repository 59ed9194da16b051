import { describe, it, expect } from 'vitest';
import { describeFileError, formatUserError } from '../error-formatter.js';

const fsError = (code: string, message: string) => Object.assign(new Error(message), { code });

describe('describeFileError', () => {
  it('maps common file system codes to short reasons', () => {
    expect(describeFileError(fsError('EACCES', "EACCES: permission denied, open 'songs.json'"))).toBe('permission denied');
    expect(describeFileError(fsError('EISDIR', 'EISDIR: illegal operation on a directory, read'))).toBe('path is a directory');
    expect(describeFileError(fsError('ENOSPC', 'ENOSPC: no space left on device, write'))).toBe('no space left on device');
  });

  it('labels JSON syntax errors', () => {
    expect(describeFileError(new SyntaxError('Unexpected end of JSON input'))).toBe('invalid JSON: Unexpected end of JSON input');
  });

  it('falls back to the first line of the message', () => {
    expect(describeFileError(new Error('something odd\n    at stack'))).toBe('something odd');
    expect(describeFileError('plain failure')).toBe('plain failure');
  });

  it('shortens very long messages', () => {
    const result = describeFileError(new Error('x'.repeat(200)));
    expect(result).toBe('x'.repeat(150) + '...');
  });
});

describe('formatUserError', () => {
  it('adds a suggestion for permission problems', () => {
    expect(formatUserError(fsError('EACCES', 'EACCES: permission denied'), 'saving songs')).toBe(
      'Permission denied while saving songs | Suggestion: Check that the catalog file and its directory are writable. | Technical: EACCES'
    );
  });

  it('explains a busy port', () => {
    expect(formatUserError(fsError('EADDRINUSE', 'listen EADDRINUSE: address already in use 127.0.0.1:8690'), 'starting the web editor')).toBe(
      'Port already in use while starting the web editor | Suggestion: Stop the other process or set WEB_UI_PORT to a free port. | Technical: listen EADDRINUSE: address already in use 127.0.0.1:8690'
    );
  });

  it('formats unknown errors generically', () => {
    expect(formatUserError(new Error('boom'), 'rendering the song list')).toBe(
      'Error rendering the song list: boom | Suggestion: Check logs for details.'
    );
  });
});
