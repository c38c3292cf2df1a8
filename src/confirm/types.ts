/** Interactive surface the confirmation gate talks to. */
export interface Prompter {
  show(text: string): void;
  /** Resolves to null once input has ended. */
  ask(question: string): Promise<string | null>;
}
