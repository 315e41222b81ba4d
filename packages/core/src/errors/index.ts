/**
 * Error types raised by the assembly pipeline and its configuration
 */

/** Collaborator that the assembler cannot build without */
export type RequiredCollaborator = 'identity' | 'workingState';

/**
 * Thrown when a build starts without a required collaborator.
 * Nothing is returned for the failed build.
 */
export class CollaboratorMissingError extends Error {
  constructor(public readonly collaborator: RequiredCollaborator) {
    super(`Cannot build prompt: ${collaborator} source is not configured`);
    this.name = 'CollaboratorMissingError';
  }
}

/** Thrown when configuration fails schema validation */
export class ConfigValidationError extends Error {
  constructor(
    public readonly source: string,
    public readonly issues: string[]
  ) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/** Thrown when a configuration file cannot be read or parsed */
export class ConfigLoadError extends Error {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to load ${path}: ${message}`, options);
    this.name = 'ConfigLoadError';
  }
}

/** Thrown when an interaction request fails validation */
export class InvalidRequestError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid interaction request: ${issues.join('; ')}`);
    this.name = 'InvalidRequestError';
  }
}
