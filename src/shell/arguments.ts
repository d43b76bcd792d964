export type Command = string | readonly string[];

export class ShellArgumentError extends Error {
  constructor(
    readonly line: string,
    message: string,
  ) {
    super(message);
    this.name = 'ShellArgumentError';
  }
}

const SAFE_TOKEN = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function quoteShellArgument(token: string): string {
  if (token.length === 0) {
    return "''";
  }
  if (SAFE_TOKEN.test(token)) {
    return token;
  }
  return `'${token.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Joins a token list into one command line. A string is taken to be an
 * already joined line and is returned as is.
 */
export function stringifyShellArguments(command: Command): string {
  if (typeof command === 'string') {
    return command;
  }
  return command.map(quoteShellArgument).join(' ');
}

type SplitState = 'between' | 'word' | 'single' | 'double';

/**
 * POSIX word splitting: whitespace separates words, single quotes are
 * literal, double quotes only honour `\"` and `\\`, and a backslash outside
 * quotes escapes the next character.
 */
export function splitShellArguments(line: string): string[] {
  const tokens: string[] = [];
  let state: SplitState = 'between';
  let current = '';

  for (let i = 0; i < line.length; i += 1) {
    const char = line.charAt(i);

    switch (state) {
      case 'between':
      case 'word': {
        if (/\s/.test(char)) {
          if (state === 'word') {
            tokens.push(current);
            current = '';
            state = 'between';
          }
          break;
        }
        state = 'word';
        if (char === "'") {
          state = 'single';
        } else if (char === '"') {
          state = 'double';
        } else if (char === '\\') {
          if (i + 1 >= line.length) {
            throw new ShellArgumentError(line, 'No escaped character after trailing backslash');
          }
          i += 1;
          current += line.charAt(i);
        } else {
          current += char;
        }
        break;
      }
      case 'single': {
        if (char === "'") {
          state = 'word';
        } else {
          current += char;
        }
        break;
      }
      case 'double': {
        if (char === '"') {
          state = 'word';
        } else if (char === '\\' && (line.charAt(i + 1) === '"' || line.charAt(i + 1) === '\\')) {
          i += 1;
          current += line.charAt(i);
        } else {
          current += char;
        }
        break;
      }
      default: {
        const exhaustive: never = state;
        throw new Error(`Unknown split state: ${String(exhaustive)}`);
      }
    }
  }

  if (state === 'single' || state === 'double') {
    throw new ShellArgumentError(line, 'No closing quotation');
  }
  if (state === 'word') {
    tokens.push(current);
  }

  return tokens;
}
