/**
 * Base class for in-process stand-ins
 *
 * Provides error scenario handling keyed by operation name, plus a call log
 * tests can assert on.
 */

export abstract class MockServiceBase<TError = Error> {
  protected errorScenarios: Map<string, TError> = new Map();
  protected defaultError: TError | null = null;
  readonly calls: Array<{ operation: string; args: unknown[] }> = [];

  /**
   * Get the service name (for logging/debugging)
   */
  abstract getServiceName(): string;

  /**
   * Fail every call of one operation with the given error
   */
  setError(operation: string, error: TError): void {
    this.errorScenarios.set(operation, error);
  }

  /**
   * Fail every call with the given error
   */
  setDefaultError(error: TError): void {
    this.defaultError = error;
  }

  /**
   * Clear all error scenarios
   */
  clearErrors(): void {
    this.errorScenarios.clear();
    this.defaultError = null;
  }

  /**
   * Record the call and throw the configured error, if any
   */
  protected record(operation: string, ...args: unknown[]): void {
    this.calls.push({ operation, args });
    const error = this.errorScenarios.get(operation) ?? this.defaultError;
    if (error !== null) {
      throw error;
    }
  }

  /**
   * Number of recorded calls, optionally for one operation
   */
  callCount(operation?: string): number {
    return operation ? this.calls.filter(call => call.operation === operation).length : this.calls.length;
  }
}
