export class KeyEncodingError extends Error {
  constructor(readonly value: unknown, reason: string) {
    super(`Cannot encode ${describe(value)} as a rendezvous key: ${reason}`);
    this.name = 'KeyEncodingError';
  }
}

export class UnknownProviderError extends Error {
  constructor(readonly providerName: string, known: readonly string[]) {
    super(`Unknown hash provider "${providerName}" (registered: ${known.join(', ') || 'none'})`);
    this.name = 'UnknownProviderError';
  }
}

export class DuplicateProviderError extends Error {
  constructor(readonly providerName: string) {
    super(`Hash provider "${providerName}" is already registered`);
    this.name = 'DuplicateProviderError';
  }
}

export class AnalysisConfigError extends Error {
  constructor(field: string, value: number) {
    super(`${field} must be a positive integer, got ${value}`);
    this.name = 'AnalysisConfigError';
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
