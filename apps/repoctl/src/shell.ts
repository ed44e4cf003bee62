const SAFE_WORD = /^[\w@%+=:,./-]+$/;

/** Single-quotes `s` for a POSIX shell. */
export function shellQuote(s: string): string {
  return `'${s.replace(/'/g, `'\\''`)}'`;
}

/** Leaves plain words alone and quotes anything a shell would split or expand. */
export function shellArg(s: string): string {
  return SAFE_WORD.test(s) ? s : shellQuote(s);
}
