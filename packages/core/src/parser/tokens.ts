/** `--name`, `--name=value` or `-x`. A lone `-5` is a value, not a flag. */
export function isFlagToken(token: string): boolean {
  return (token.startsWith("--") && token.length > 2) || /^-[A-Za-z]$/.test(token);
}
