export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends HttpError {
  constructor(resource: string) {
    super(404, `${resource} not found`);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'Forbidden') {
    super(403, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}

/**
 * Thrown by the role gates. Not a failure: the error middleware answers
 * with a plain redirect, the way a page would bounce a visitor home.
 */
export class RedirectSignal extends Error {
  constructor(public readonly location: string) {
    super(`Redirect to ${location}`);
    this.name = 'RedirectSignal';
  }
}
