export { toHttpException, ErrorResponseBody } from './http-error.mapper';
