/**
 * Error thrown when the tracker rejects or fails a request
 */
export class TrackerError extends Error {
  public readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'TrackerError';
    this.status = status;
    Object.setPrototypeOf(this, TrackerError.prototype);
  }
}
