export class KnowledgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The observations, or the deductions drawn from them, cannot all be true.
 * Continuing after one would only cascade into wrong deductions.
 */
export class ContradictionError extends KnowledgeError {}

/** A position, count or config failed validation. */
export class InvalidInputError extends KnowledgeError {}
