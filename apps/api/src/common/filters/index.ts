export { HttpExceptionFilter, buildErrorBody } from './http-exception.filter';
export type { ErrorResponseBody } from './http-exception.filter';
