export interface GenerationRequest {
  readonly prompt: string;
  /** Name of the stage asking, for logs. */
  readonly stageName?: string;
  readonly signal?: AbortSignal;
}

/**
 * Text generation as seen by the pipeline: a prompt goes in, text comes out.
 * Implementations throw GenerationFailure on any error.
 */
export interface GenerationCapability {
  generate(request: GenerationRequest): Promise<string>;
}
