/**
 * Response envelope shared by the JSON endpoints (except the raw `/api/stocks` mapping)
 */

export interface ApiResponse<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  message?: string;
}

export class ResponseUtils {
  public static success<T>(data: T, message?: string): ApiResponse<T> {
    return {
      ok: true,
      data,
      message
    };
  }

  public static error(error: string | Error, message?: string): ApiResponse<never> {
    return {
      ok: false,
      error: error instanceof Error ? error.message : error,
      message
    };
  }

  public static notFound(resource: string): ApiResponse<never> {
    return {
      ok: false,
      error: `${resource} not found`,
      message: `The requested ${resource} could not be found`
    };
  }

  public static internalError(message = 'Internal server error'): ApiResponse<never> {
    return {
      ok: false,
      error: 'Internal server error',
      message
    };
  }
}
