/**
 * @module sinew-di/application/diagnostics
 */

import { ServiceKey } from '../../domain/keys';
import { DIError } from '../../domain/exceptions';
import type { Registration } from '../registration';
import { DiagnosticSeverity, DiagnosticType } from './DiagnosticType';

/**
 * One finding of the analyzer.
 */
export interface DiagnosticResult {
  readonly type: DiagnosticType;
  readonly severity: DiagnosticSeverity;
  readonly serviceKey: ServiceKey;
  readonly serviceName: string;
  readonly description: string;

  /** The registration the finding is about; suppressions are read from it */
  readonly registration?: Registration;
}

/**
 * `verify()` found diagnostics of warning or error severity.
 */
export class DiagnosticVerificationError extends DIError {
  constructor(public readonly results: readonly DiagnosticResult[]) {
    super(
      `The configuration is invalid. ${results.length} diagnostic warning(s) were reported:\n` +
        results.map((result) => `-[${result.type}] ${result.description}`).join('\n'),
    );
    this.name = 'DiagnosticVerificationError';
  }
}
