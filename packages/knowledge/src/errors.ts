/** Base class for everything the knowledge base throws. */
export class KnowledgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "KnowledgeError";
  }
}

/**
 * The caller broke a precondition of the ingestion boundary: a cell outside
 * the grid, a cell observed twice, a count that cannot be a neighbor count.
 * Thrown before any state is touched.
 */
export class ContractViolationError extends KnowledgeError {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}

/**
 * A sentence count left 0..|cells|, a cell became both mine and safe, or
 * inference failed to converge. Either the observations contradict each
 * other or the engine is wrong; the knowledge base must not be used further.
 */
export class InvariantViolationError extends KnowledgeError {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export function isKnowledgeError(error: unknown): error is KnowledgeError {
  return error instanceof KnowledgeError;
}
