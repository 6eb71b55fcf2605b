export type RenderStage = 'clone' | 'render' | 'write';

/**
 * Raised while turning rendered manifests into application descriptors.
 * The input has to be fixed; retrying will not help.
 */
export class ApplicationParseError extends Error {
  constructor(
    message: string,
    public readonly application?: string,
    options?: ErrorOptions
  ) {
    super(
      application ? `application '${application}' is invalid: ${message}` : message,
      options
    );
    this.name = 'ApplicationParseError';
  }
}

/**
 * A single application failed at one stage of its render. Siblings are not
 * affected.
 */
export class ApplicationRenderError extends Error {
  constructor(
    public readonly application: string,
    public readonly stage: RenderStage,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ApplicationRenderError';
  }
}

export class AggregateRenderError extends Error {
  readonly failureCount: number;

  constructor(public readonly failures: ApplicationRenderError[]) {
    const [first] = failures;
    super(
      `failed to process ${failures.length} application(s), first error: ${first?.message ?? 'unknown error'}`,
      {cause: first}
    );
    this.name = 'AggregateRenderError';
    this.failureCount = failures.length;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
