import type { FetchStage } from '../types/lead.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialError';
  }
}

/** A fetch stage could not produce its records. Caught at the stage boundary. */
export class FetchFailure extends Error {
  readonly stage: FetchStage;

  constructor(stage: FetchStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchFailure';
    this.stage = stage;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
