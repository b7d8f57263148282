// Error body returned by HttpExceptionFilter
export interface HttpExceptionResponse {
  statusCode: number;
  message: string | string[];
  error?: string;
  timestamp: string;
  path: string;
}
