/**
 * Render argv as a line a POSIX shell would split back into the same words.
 * Used for tracing only; steps are always spawned without a shell.
 */
const PLAIN_WORD = /^[\w@%+=:,./-]+$/;

function quoteWord(word: string): string {
  if (word === "") return "''";
  if (PLAIN_WORD.test(word)) return word;
  // close the quote, emit an escaped quote, reopen: it's -> 'it'\''s'
  return `'${word.split("'").join(`'\\''`)}'`;
}

export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args].map(quoteWord).join(" ");
}
