import { ScansDisabledError } from '../errors';
import type { CompiledStatement } from './QueryTypes';

/**
 * Rejects statements that would need a full scan unless scans are enabled,
 * either on the guard or for a single call.
 */
export class ScanGuard {
  constructor(private scansEnabled = false) {}

  setScansEnabled(enabled: boolean): void {
    this.scansEnabled = enabled;
  }

  isScansEnabled(): boolean {
    return this.scansEnabled;
  }

  /**
   * @param override - per-call setting; takes precedence when given
   * @throws ScansDisabledError
   */
  checkAllowed(statement: CompiledStatement, override?: boolean): void {
    if (statement.fullScanRequired && !(override ?? this.scansEnabled)) {
      throw new ScansDisabledError();
    }
  }
}
