/**
 * Joining an argument vector into one command line for a shell.
 *
 * Two families exist: the Windows command interpreter, which hands the line
 * to the child's C runtime for splitting, and everything POSIX-like.
 */
export type QuotingFamily = 'windows_cmd' | 'posix';

export function quotingFamilyOf(shell: string): QuotingFamily {
  return shell === 'cmd.exe' ? 'windows_cmd' : 'posix';
}

/**
 * Join `args` the way the MS C runtime splits them back:
 * - arguments are separated by a single space
 * - an argument is wrapped in double quotes if it is empty or holds a space or tab
 * - backslashes are literal unless they precede a double quote; then they are doubled
 *   and the quote is escaped as `\"`
 * - trailing backslashes of a quoted argument are doubled so the closing quote survives
 */
export function joinWindowsCommandLine(args: readonly string[]): string {
  const out: string[] = [];

  for (const arg of args) {
    if (out.length > 0) out.push(' ');

    const needQuote = arg.length === 0 || arg.includes(' ') || arg.includes('\t');
    if (needQuote) out.push('"');

    let backslashes = 0;
    for (const c of arg) {
      if (c === '\\') {
        backslashes++;
      } else if (c === '"') {
        out.push('\\'.repeat(backslashes * 2), '\\"');
        backslashes = 0;
      } else {
        if (backslashes > 0) {
          out.push('\\'.repeat(backslashes));
          backslashes = 0;
        }
        out.push(c);
      }
    }

    if (backslashes > 0) out.push('\\'.repeat(backslashes));
    if (needQuote) {
      out.push('\\'.repeat(backslashes), '"');
    }
  }

  return out.join('');
}

function posixQuoteChar(arg: string): string {
  if (arg.includes('"')) return "'";
  if (arg.includes("'")) return '"';
  if (!arg.includes(' ') && !arg.includes('\n')) return '';
  return '"';
}

/**
 * Quote each argument for a POSIX shell and join with spaces.
 *
 * Quote choice, in order: `'` if the argument has a `"`, else `"` if it has a `'`,
 * else nothing if it has no space or newline, else `"`.
 *
 * KNOWN LIMITATION: the chosen quote character is not escaped, so an argument
 * holding both `"` and `'` is wrapped in `'` and its inner `'` ends the quoting
 * early. Changing this would change the text of generated scripts.
 */
export function joinPosixCommandLine(args: readonly string[]): string {
  return args
    .map((arg) => {
      const quote = posixQuoteChar(arg);
      return `${quote}${arg}${quote}`;
    })
    .join(' ');
}

export function quoteArguments(args: readonly string[], family: QuotingFamily): string {
  return family === 'windows_cmd' ? joinWindowsCommandLine(args) : joinPosixCommandLine(args);
}

/**
 * Quote `args` for the named shell (`cmd.exe` or any POSIX-like shell).
 *
 * @example quoteForShell(['a b', 'c"d'], 'bash') === `"a b" 'c"d'`
 */
export function quoteForShell(args: readonly string[], shell: string): string {
  return quoteArguments(args, quotingFamilyOf(shell));
}
