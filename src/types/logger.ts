/**
 * Output sink used by the extraction workflow. `console` satisfies it.
 */
export interface Logger {
  log: (message: string) => void;
  error: (message: string) => void;
}
