export interface CommandContext {
  verbose: boolean;
  /** True when a human can answer prompts (stdin is a TTY) */
  interactive: boolean;
  confirm: (question: string) => Promise<boolean>;
  /** User-facing progress output */
  print: (message: string) => void;
}
