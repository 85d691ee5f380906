export class InvalidIdentifierError extends Error {
  constructor(
    public readonly field: 'userId' | 'sessionId',
    public readonly value: string,
    reason: string,
  ) {
    super(`Invalid ${field} "${value}": ${reason}`);
    this.name = 'InvalidIdentifierError';
  }
}
