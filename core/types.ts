/**
 * Shared Types
 *
 * The boundary between the coordinator and whatever language-model backend
 * sits behind it. Backends only need to honor `LLMClient.complete`: take
 * instructions, a payload and a JSON Schema, and hand back raw structured
 * data. Validation of that data happens on our side of the boundary.
 */

// =============================================================================
// LOGGING
// =============================================================================

/**
 * Logging function injected into components. Defaults to console.log.
 */
export type Logger = (message: string) => void;

// =============================================================================
// SCHEMA DESCRIPTORS
// =============================================================================

/**
 * Subset of JSON Schema used to describe structured output to a backend.
 *
 * Declared as a type alias (not an interface) so it stays assignable to the
 * `Record<string, unknown>` shape SDKs expect.
 */
export type JsonSchema = {
  type: 'object' | 'array' | 'string' | 'integer' | 'number' | 'boolean';
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  enum?: string[];
  minItems?: number;
  maxItems?: number;
  minimum?: number;
  maximum?: number;
  additionalProperties?: boolean;
};

export interface SchemaDescriptor {
  /** Identifier sent to the backend, e.g. "research_result" */
  name: string;
  description: string;
  schema: JsonSchema;
}

// =============================================================================
// LLM CLIENT
// =============================================================================

export type MessageRole = 'user' | 'assistant' | 'system';

export interface CompletionRequest {
  /** Fixed role description for the agent being called */
  instructions: string;
  /** Request-specific input */
  payload: string;
  /** Shape the returned value must conform to */
  outputSchema: SchemaDescriptor;
  /** Aborts the pending call (session shutdown) */
  signal?: AbortSignal;
}

/**
 * The only interface to a language-model backend.
 *
 * Implementations throw BackendUnavailable when the backend cannot be
 * reached, SchemaViolation when the reply is not structured data at all,
 * and UserInterrupt when the call was aborted.
 */
export interface LLMClient {
  complete(request: CompletionRequest): Promise<unknown>;
}
