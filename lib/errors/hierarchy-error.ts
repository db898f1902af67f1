export type HierarchyErrorCode =
  | 'INVALID_EXTENSION'
  | 'UNKNOWN_FILTER_KEY'
  | 'INVALID_FILTER_RESULT'
  | 'INVALID_CONFIG';

/**
 * Raised for setup mistakes only. Resolving a hierarchy never throws for
 * missing content data; it yields a shorter candidate list instead.
 */
export class HierarchyError extends Error {
  constructor(
    message: string,
    public readonly code: HierarchyErrorCode
  ) {
    super(message);
    this.name = 'HierarchyError';
  }

  static invalidExtension(extension: string): HierarchyError {
    return new HierarchyError(
      `Template extension "${extension}" is empty after normalization`,
      'INVALID_EXTENSION'
    );
  }

  static unknownFilterKey(key: string): HierarchyError {
    return new HierarchyError(`Unknown hierarchy filter key: ${key}`, 'UNKNOWN_FILTER_KEY');
  }

  static invalidFilterResult(key: string): HierarchyError {
    return new HierarchyError(
      `Filter registered under "${key}" did not return a candidate list`,
      'INVALID_FILTER_RESULT'
    );
  }

  static invalidConfig(issues: string[]): HierarchyError {
    return new HierarchyError(`Invalid hierarchy config: ${issues.join('; ')}`, 'INVALID_CONFIG');
  }
}

export function isHierarchyError(error: unknown): error is HierarchyError {
  return error instanceof HierarchyError;
}
