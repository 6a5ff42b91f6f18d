/**
 * Text completion provider interface.
 * Wraps external language-model APIs used to phrase replies.
 */

export interface CompletionRequest {
  /** Standing instructions for the model. */
  system: string;
  prompt: string;
}

export interface ICompletionProvider {
  /** Return the model's raw reply text. */
  complete(request: CompletionRequest): Promise<string>;
}
