import {
  splitShellArguments,
  stringifyShellArguments,
  type Command,
} from '../shell/arguments.js';
import type { ElevationPlan, ElevationStrategy } from './types.js';

export interface CompositionOptions {
  user?: string;
  shell?: string;
  elevation: ElevationStrategy;
}

/**
 * Builds the wrapper around a command run as another user.
 *
 * The sudo suffix is the command stringified and split again, so tokens
 * carrying shell metacharacters come out re-quoted rather than preserved:
 * `echo hi; id` ends up as `echo 'hi;' id`.
 */
export function composeElevationPlan(
  command: Command,
  user: string,
  elevation: ElevationStrategy,
  shell?: string,
): ElevationPlan {
  const line = stringifyShellArguments(command);
  const shellFlag = shell !== undefined ? ['-s', shell] : [];

  switch (elevation) {
    case 'sudo':
      return {
        prefix: ['sudo', '-u', user],
        shellFlag,
        suffix: splitShellArguments(line),
      };
    case 'su':
      return {
        prefix: ['su', user],
        shellFlag,
        suffix: ['-c', line],
      };
    default: {
      const exhaustive: never = elevation;
      throw new Error(`Unsupported elevation strategy: ${String(exhaustive)}`);
    }
  }
}

export function composeCommandTokens(command: Command, options: CompositionOptions): Command {
  const { user, shell, elevation } = options;

  if (user === undefined) {
    const line = stringifyShellArguments(command);
    return shell !== undefined ? [shell, '-c', line] : line;
  }

  const plan = composeElevationPlan(command, user, elevation, shell);
  return [...plan.prefix, ...plan.shellFlag, ...plan.suffix];
}

/** Single command line handed to a transport. */
export function composeCommandLine(command: Command, options: CompositionOptions): string {
  return stringifyShellArguments(composeCommandTokens(command, options));
}
