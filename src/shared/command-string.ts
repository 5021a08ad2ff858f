const SAFE_WORD = /^[\w@%+=:,./-]+$/;

// POSIX shell quoting, so a logged command can be pasted back into a shell.
export function quoteArg(arg: string): string {
  if (arg === '') return "''";
  if (SAFE_WORD.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

export function strCommand(argv: readonly string[]): string {
  return argv.map(quoteArg).join(' ');
}
