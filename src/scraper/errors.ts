/**
 * Errors raised while submitting, polling or downloading an award export.
 * All extend AwardFetchError so the orchestrator can recover per group.
 */

export class AwardFetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class HttpStatusError extends AwardFetchError {
  constructor(
    readonly method: string,
    readonly url: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${method} ${url} failed ${status}: ${body}`);
  }
}

export class MissingJobIdError extends AwardFetchError {
  constructor(readonly body: string) {
    super(`No job id in download response: ${body}`);
  }
}

export class JobFailedError extends AwardFetchError {
  constructor(readonly jobId: string, readonly detail?: string) {
    super(detail ? `Download job ${jobId} failed: ${detail}` : `Download job ${jobId} failed`);
  }
}

export class PollDeadlineExceededError extends AwardFetchError {
  constructor(readonly jobId: string, readonly deadlineMs: number) {
    super(`Download job ${jobId} did not finish within ${deadlineMs}ms`);
  }
}

export class PollAbortedError extends AwardFetchError {
  constructor(readonly jobId: string) {
    super(`Polling for download job ${jobId} was aborted`);
  }
}

export class RunAbortedError extends AwardFetchError {
  constructor(readonly group: string) {
    super(`Award run aborted at the ${group} group`);
  }
}
