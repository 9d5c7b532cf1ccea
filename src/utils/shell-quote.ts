const SAFE_ARGUMENT = /^[\w@%+=:,./-]+$/;

/**
 * Quote a single argument for display as a POSIX shell word
 */
export function quoteArgument(arg: string): string {
  if (arg.length > 0 && SAFE_ARGUMENT.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command and its arguments as a copy-pasteable shell line
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(quoteArgument).join(" ");
}
