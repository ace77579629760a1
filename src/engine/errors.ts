// src/engine/errors.ts

export type LabEngineErrorKind =
  | 'pediatric_not_supported'
  | 'unknown_test'
  | 'unsupported_conversion'
  | 'invalid_input'
  | 'registry_config';

export abstract class LabEngineError extends Error {
  abstract readonly kind: LabEngineErrorKind;
}

export class PediatricNotSupportedError extends LabEngineError {
  readonly kind = 'pediatric_not_supported';

  constructor(readonly minPatientAge: number) {
    super(
      `Pediatric lab interpretation is not supported. ` +
        `This system is designed for adult patients only (age ${minPatientAge}+).`
    );
    this.name = 'PediatricNotSupportedError';
  }
}

export class UnknownTestError extends LabEngineError {
  readonly kind = 'unknown_test';

  constructor(readonly testCode: string) {
    super(`Unknown test code: ${testCode}`);
    this.name = 'UnknownTestError';
  }
}

export class UnsupportedConversionError extends LabEngineError {
  readonly kind = 'unsupported_conversion';

  constructor(
    message: string,
    readonly testCode: string,
    readonly fromUnit: string,
    readonly supportedUnits: string[]
  ) {
    super(message);
    this.name = 'UnsupportedConversionError';
  }
}

export class InvalidInputError extends LabEngineError {
  readonly kind = 'invalid_input';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** @throws InvalidInputError when value is NaN or infinite */
export function assertFiniteValue(value: number, label: string): void {
  if (!Number.isFinite(value)) throw new InvalidInputError(`${label} must be a finite number, got ${value}`);
}

export class RegistryConfigError extends LabEngineError {
  readonly kind = 'registry_config';

  constructor(readonly problems: string[]) {
    super(`Invalid lab test registry:\n  - ${problems.join('\n  - ')}`);
    this.name = 'RegistryConfigError';
  }
}

export function isLabEngineError(e: unknown): e is LabEngineError {
  return e instanceof LabEngineError;
}
