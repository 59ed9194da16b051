/**
 * Argument parsing for the song-catalog command
 */

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'editor' }
  | { kind: 'batch'; args: string[] }
  | { kind: 'unknown'; command: string }
  | { kind: 'invalid'; message: string };

export interface ParsedCli {
  command: CliCommand;
  /** Catalog file from --file, overriding SONGS_FILE */
  songsFile?: string;
}

const HELP_FLAGS = new Set(['--help', '-h', 'help']);
const EDITOR_COMMANDS = new Set(['editor', 'server', 'start']);
const BATCH_PREFIXES = new Set(['--cli', 'cli']);
const BATCH_COMMANDS = new Set(['--list', '--add', '--remove']);

export function parseCliArgs(argv: readonly string[]): ParsedCli {
  const rest: string[] = [];
  let songsFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--file') {
      const value = argv[i + 1];
      if (value === undefined || value === '') {
        return { command: { kind: 'invalid', message: '--file requires a path' } };
      }
      songsFile = value;
      i++;
    } else if (arg.startsWith('--file=')) {
      songsFile = arg.slice('--file='.length);
      if (!songsFile) {
        return { command: { kind: 'invalid', message: '--file requires a path' } };
      }
    } else {
      rest.push(arg);
      // Batch arguments are taken verbatim, so a title may look like an option
      if (BATCH_COMMANDS.has(arg) || (rest.length > 1 && BATCH_PREFIXES.has(rest[0]))) {
        rest.push(...argv.slice(i + 1));
        break;
      }
    }
  }

  const [first] = rest;

  if (first === undefined || EDITOR_COMMANDS.has(first)) {
    return { command: { kind: 'editor' }, songsFile };
  }
  if (HELP_FLAGS.has(first)) {
    return { command: { kind: 'help' }, songsFile };
  }
  if (BATCH_PREFIXES.has(first)) {
    return { command: { kind: 'batch', args: rest.slice(1) }, songsFile };
  }
  if (BATCH_COMMANDS.has(first)) {
    return { command: { kind: 'batch', args: rest }, songsFile };
  }
  return { command: { kind: 'unknown', command: first }, songsFile };
}
