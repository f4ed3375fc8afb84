/**
 * Error body returned for every failed request
 */
export class ErrorResponseDto {
  /**
   * @example 400
   */
  statusCode: number;

  /**
   * @example "Validation failed"
   */
  message: string;

  /**
   * @example "2026-10-19T10:30:00.000Z"
   */
  timestamp: string;

  /**
   * @example "/health/db"
   */
  path: string;

  /**
   * Individual problems behind `message`, when there are several
   * @example ["content: content must be shorter than or equal to 255 characters"]
   */
  details?: string[];

  constructor(
    statusCode: number,
    message: string,
    path: string,
    details?: string[],
  ) {
    this.statusCode = statusCode;
    this.message = message;
    this.timestamp = new Date().toISOString();
    this.path = path;
    this.details = details;
  }
}
