import { ValidationPipe } from '@nestjs/common';

/**
 * Global DTO validation. Unknown properties are stripped, not rejected:
 * clients that send their own `total` or item `price` still get an order
 * priced from the catalog.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    transformOptions: {
      enableImplicitConversion: true,
    },
  });
}
