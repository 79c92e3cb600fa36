import type { z } from 'zod';

export class PubMedRequestError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly status: number,
    body: string
  ) {
    super(`PubMed ${endpoint} failed: ${status} ${body.slice(0, 200)}`);
    this.name = 'PubMedRequestError';
  }
}

export class PubMedResponseError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly issues: z.ZodIssue[]
  ) {
    super(`PubMed ${endpoint} returned an unexpected payload: ${issues.map((i) => i.message).join('; ')}`);
    this.name = 'PubMedResponseError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly validationErrors: z.ZodError) {
    super(
      `Invalid configuration: ${validationErrors.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join(', ')}`
    );
    this.name = 'ConfigError';
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
