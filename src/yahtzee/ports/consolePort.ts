export interface ConsolePort {
  /** Shows the prompt and resolves with the next line typed, without its newline. */
  ask(prompt: string): Promise<string>;
  print(line?: string): void;
  close(): void;
}
