import { HttpException, HttpStatus } from "@nestjs/common";
import { ErrorCode } from "@logging/value-objects";

/**
 * Normalized error structure for consistent logging.
 */
export interface NormalizedError {
  /** Error class name (e.g. 'InternalServerErrorException', 'TypeError') */
  type: string;
  /** Stable error code for grouping/querying */
  code: string;
  /** Short, stable error message */
  message: string;
  /** HTTP status the transport will answer with */
  status: number;
  /** Stack trace, truncated (omitted in production) */
  stack?: string;
}

/**
 * ErrorNormalizer - Normalizes thrown values to a consistent structure.
 *
 * Lives in the presentation layer because it depends on NestJS HttpException.
 * Anything that is not an HttpException maps to 500, which is what the
 * exception filter answers for it.
 */
export class ErrorNormalizer {
  /** Maximum message length to prevent log bloat */
  private static readonly MAX_MESSAGE_LENGTH = 200;
  /** Maximum stack frames kept below the message line */
  private static readonly MAX_STACK_LINES = 5;
  /** Whether to include stack traces */
  private static readonly INCLUDE_STACK = process.env.NODE_ENV !== "production";

  static normalize(error: unknown): NormalizedError {
    if (error instanceof HttpException) {
      return this.normalizeHttpException(error);
    }

    if (error instanceof Error) {
      return this.normalizeError(error);
    }

    return this.normalizeUnknown(error);
  }

  private static normalizeHttpException(error: HttpException): NormalizedError {
    const status = error.getStatus();
    return {
      type: error.constructor.name,
      code: this.httpStatusToCode(status),
      message: this.extractMessage(error.getResponse(), error.message),
      status,
      stack: this.getStack(error),
    };
  }

  private static normalizeError(error: Error): NormalizedError {
    const code =
      "code" in error && typeof error.code === "string"
        ? error.code
        : ErrorCode.INTERNAL_ERROR;

    return {
      type: error.constructor.name || error.name,
      code,
      message: this.truncateMessage(error.message || "Unknown error"),
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      stack: this.getStack(error),
    };
  }

  private static normalizeUnknown(error: unknown): NormalizedError {
    const message =
      typeof error === "string"
        ? error
        : typeof error === "object" && error !== null
          ? JSON.stringify(error)
          : "Unknown error";

    return {
      type: typeof error,
      code: ErrorCode.UNKNOWN,
      message: this.truncateMessage(message),
      status: HttpStatus.INTERNAL_SERVER_ERROR,
    };
  }

  /**
   * Map HTTP status code to a stable error code string.
   */
  static httpStatusToCode(status: number): string {
    const statusMap: Record<number, ErrorCode> = {
      [HttpStatus.BAD_REQUEST]: ErrorCode.BAD_REQUEST,
      [HttpStatus.UNAUTHORIZED]: ErrorCode.UNAUTHORIZED,
      [HttpStatus.FORBIDDEN]: ErrorCode.FORBIDDEN,
      [HttpStatus.NOT_FOUND]: ErrorCode.NOT_FOUND,
      [HttpStatus.CONFLICT]: ErrorCode.CONFLICT,
      [HttpStatus.UNPROCESSABLE_ENTITY]: ErrorCode.VALIDATION_ERROR,
      [HttpStatus.TOO_MANY_REQUESTS]: ErrorCode.RATE_LIMITED,
      [HttpStatus.INTERNAL_SERVER_ERROR]: ErrorCode.INTERNAL_ERROR,
      [HttpStatus.BAD_GATEWAY]: ErrorCode.BAD_GATEWAY,
      [HttpStatus.SERVICE_UNAVAILABLE]: ErrorCode.SERVICE_UNAVAILABLE,
      [HttpStatus.GATEWAY_TIMEOUT]: ErrorCode.GATEWAY_TIMEOUT,
    };

    return statusMap[status] ?? `HTTP_${status}`;
  }

  /**
   * Extract message from HttpException response (string | object | array).
   */
  private static extractMessage(response: unknown, fallback: string): string {
    let message: string;

    if (typeof response === "string") {
      message = response;
    } else if (typeof response === "object" && response !== null) {
      const text = "message" in response ? response.message : undefined;
      message = Array.isArray(text)
        ? text.slice(0, 3).map(String).join("; ")
        : typeof text === "string"
          ? text
          : fallback;
    } else {
      message = fallback;
    }

    return this.truncateMessage(message);
  }

  private static getStack(error: Error): string | undefined {
    if (!this.INCLUDE_STACK || !error.stack) {
      return undefined;
    }

    const lines = error.stack.split("\n");
    return lines.slice(0, this.MAX_STACK_LINES + 1).join("\n");
  }

  private static truncateMessage(message: string): string {
    if (message.length <= this.MAX_MESSAGE_LENGTH) {
      return message;
    }
    return message.slice(0, this.MAX_MESSAGE_LENGTH - 3) + "...";
  }
}
