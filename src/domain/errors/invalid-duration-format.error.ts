export class InvalidDurationFormatError extends Error {
  constructor(
    readonly token: string,
    reason?: string,
  ) {
    super(
      reason ??
        `Invalid duration format: ${token}. Use format like '24h', '60m', or '2d'`,
    );
    this.name = 'InvalidDurationFormatError';
  }
}
