import { StatusCodes } from 'http-status-codes';

export class HttpError extends Error {
  readonly statusCode: StatusCodes;

  constructor(statusCode: StatusCodes, message: string, options?: ErrorOptions) {
    super(message, options);

    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class BadRequestError extends HttpError {
  constructor(message = 'Bad Request', options?: ErrorOptions) {
    super(StatusCodes.BAD_REQUEST, message, options);
  }
}
