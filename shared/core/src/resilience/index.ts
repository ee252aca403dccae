export { getErrorMessage, isRetryableError, formatErrorForLog } from './error-handling';
