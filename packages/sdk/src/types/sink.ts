/**
 * Destination for usage/help output. `process.stdout` satisfies it.
 */
export interface OutputSink {
  write(chunk: string): unknown;
}
