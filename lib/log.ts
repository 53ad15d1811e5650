/**
 * Verbose output is enabled with REPORT_DEBUG=1 (the CLI's --debug flag sets it).
 */
export function isDebug(): boolean {
  return process.env.REPORT_DEBUG === '1';
}

export function debugLog(tag: string, ...args: unknown[]): void {
  if (isDebug()) {
    console.log(`[${tag}]`, ...args);
  }
}
