/**
 * Anything that can answer a classification question about a piece of text.
 *
 * Implementations throw `LlmUnavailableError` once the backend is considered
 * unreachable and `LlmError` for any other failure. An empty reply is `''`.
 */
export interface ClassificationOracle {
  readonly name: string;
  classify(text: string, instructions: string): Promise<string>;
}
