/**
 * Input handling for the interactive browser
 */

export type BrowserAction =
  | { kind: 'ls'; path: string }
  | { kind: 'cd'; target: string }
  | { kind: 'clear' }
  | { kind: 'help' }
  | { kind: 'exit' }
  | { kind: 'invalid'; message: string };

export const HELP_TEXT = [
  'Available commands:',
  '  ls [path]  - show the contents of a directory',
  '  cd <path>  - change the current directory',
  '  cd ..      - go up one level',
  '  clear      - clear the screen',
  '  help       - show this help',
  '  exit       - quit',
].join('\n');

export function parseInput(line: string): BrowserAction {
  const trimmed = line.trim();
  const [verb = '', ...rest] = trimmed.split(/\s+/);
  const argument = rest.join(' ');

  switch (verb) {
    case 'ls':
      return { kind: 'ls', path: argument };
    case 'cd':
      return argument
        ? { kind: 'cd', target: argument }
        : { kind: 'invalid', message: 'Specify a directory' };
    case 'clear':
      return { kind: 'clear' };
    case 'help':
      return { kind: 'help' };
    case 'exit':
    case 'quit':
      return { kind: 'exit' };
    default:
      return { kind: 'invalid', message: 'Unknown command' };
  }
}
