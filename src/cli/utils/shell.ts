// Quote one argument for a POSIX `sh -c` command line.
export function quoteShellArg(arg: string): string {
  if (arg === "") {
    return "''";
  }

  if (/["'\s;|&$`\\<>(){}\[\]*?#~!]/.test(arg)) {
    return `'${arg.replace(/'/g, "'\\''")}'`;
  }

  return arg;
}

export function quoteShellCommand(argv: string[]): string {
  return argv.map(quoteShellArg).join(" ");
}
