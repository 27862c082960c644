export type ResourceLimit = 'condition' | 'visits';

export class StructuralError extends Error {
  override readonly name = 'StructuralError';

  constructor(
    message: string,
    readonly selectorPath: string,
    readonly nodePath: string,
  ) {
    super(`${message} (selector: ${selectorPath || '<root>'}, node: /${nodePath})`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ResourceLimitError extends Error {
  override readonly name = 'ResourceLimitError';

  constructor(
    readonly limit: ResourceLimit,
    readonly budget: number,
    readonly selectorPath: string,
    readonly nodePath: string,
    message?: string,
  ) {
    super(message ?? `${limit} budget of ${budget} exhausted (selector: ${selectorPath || '<root>'}, node: /${nodePath})`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AccessorError extends Error {
  override readonly name = 'AccessorError';

  constructor(
    message: string,
    override readonly cause?: unknown,
    readonly selectorPath: string = '',
    readonly nodePath: string = '',
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TraversalAbortedError extends Error {
  override readonly name = 'TraversalAbortedError';

  constructor(
    readonly selectorPath: string,
    readonly nodePath: string,
    override readonly cause?: unknown,
  ) {
    super(`Traversal aborted at /${nodePath}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SelectorDefinitionError extends Error {
  override readonly name = 'SelectorDefinitionError';

  constructor(
    message: string,
    readonly at: string = '',
  ) {
    super(at === '' ? message : `${message} at ${at}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class BlockStoreError extends Error {
  override readonly name = 'BlockStoreError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
