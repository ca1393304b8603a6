export { createValidationPipe } from './validation.pipe';
