/**
 * Error with an explicit HTTP status, thrown by route handlers.
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: FieldProblem[],
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * One invalid field in a request.
 */
export interface FieldProblem {
  field: string;
  message: string;
}

/**
 * JSON body sent for every failed request.
 */
export interface ErrorBody {
  error: string;
  details?: FieldProblem[];
}
