/**
 * Raised by schema resolvers. Carries no source offset: the parser knows which
 * token triggered the lookup and relocates the failure onto it.
 */
export type ResolutionFailure =
  | { kind: 'UnknownIdentifier'; name: string }
  | { kind: 'UnknownProperty'; name: string; sourceType: string }
  | { kind: 'UnknownFunction'; name: string; argumentTypes: string[] };

export class ResolutionError extends Error {
  public readonly failure: ResolutionFailure;

  constructor(failure: ResolutionFailure) {
    super(describeFailure(failure));
    this.name = 'ResolutionError';
    this.failure = failure;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ResolutionError);
    }
  }
}

export function describeFailure(failure: ResolutionFailure): string {
  switch (failure.kind) {
    case 'UnknownIdentifier':
      return `Unknown identifier '${failure.name}'`;
    case 'UnknownProperty':
      return `Type '${failure.sourceType}' has no property '${failure.name}'`;
    case 'UnknownFunction':
      return `No function '${failure.name}' accepts (${failure.argumentTypes.join(', ')})`;
  }
}
