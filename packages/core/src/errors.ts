/**
 * Error classes for artifact handling
 */

/**
 * Base error class for author artifact errors
 */
export class ArtifactError extends Error {
  constructor(
    message: string,
    public readonly artifactPath?: string,
  ) {
    super(message);
    this.name = 'ArtifactError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ArtifactError);
    }
  }
}

/**
 * Error thrown when the artifact file does not exist
 */
export class ArtifactNotFoundError extends ArtifactError {
  constructor(artifactPath: string) {
    super(`Input file not found: ${artifactPath}`, artifactPath);
    this.name = 'ArtifactNotFoundError';
  }
}

/**
 * Error thrown when the artifact is not valid JSON or has the wrong shape
 */
export class ArtifactParseError extends ArtifactError {
  constructor(
    artifactPath: string,
    public readonly reason: string,
  ) {
    super(`Failed to parse ${artifactPath}: ${reason}`, artifactPath);
    this.name = 'ArtifactParseError';
  }
}
