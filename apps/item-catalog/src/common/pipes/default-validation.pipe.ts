import {
  HttpStatus,
  ValidationPipe,
  ValidationPipeOptions,
} from '@nestjs/common';

/**
 * Global pipe: unknown properties are rejected and failures answer 422.
 */
export class DefaultValidationPipe extends ValidationPipe {
  constructor(overwriteDefaultOptions: ValidationPipeOptions = {}) {
    super({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
      errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      validationError: { target: false, value: false },
      ...overwriteDefaultOptions,
    });
  }
}
