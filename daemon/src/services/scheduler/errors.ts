/**
 * The scheduler loop has terminated (shut down or crashed). Every facade
 * call made afterwards rejects with this error.
 */
export class SchedulerUnavailableError extends Error {
  constructor(message = "the scheduler loop is not running") {
    super(message);
    this.name = "SchedulerUnavailableError";
  }
}
