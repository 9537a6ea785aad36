// Strips CSI and OSC sequences plus two-byte escapes such as ESC=.
const ANSI_PATTERN =
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ESC is part of every sequence
  /\x1B\[[0-?]*[ -/]*[@-~]|\x1B\][^\x07\x1B]*(?:\x07|\x1B\\)|\x1B[=>@-Z\\-_]/g;

/** Remove ANSI escape sequences from terminal output. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}
